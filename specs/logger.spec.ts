import { describe, expect, it, stub } from "./dev_deps.ts";
import { consoleLogger, nullLogger } from "../src/logger.ts";

describe("consoleLogger()", () => {
    it("writes each level to the matching console method", () => {
        // Given the console methods are stubbed
        const debug = stub(console, "debug"), info = stub(console, "info");
        const warn = stub(console, "warn"), error = stub(console, "error");
        try {
            // When each level is logged
            const logger = consoleLogger("[test]");
            logger.log("a"); logger.info("b"); logger.warn("c"); logger.error("d");
        } finally {
            debug.restore(); info.restore(); warn.restore(); error.restore();
        }
        // Then each goes to its method, with the prefix
        expect(debug).to.have.been.calledOnceWithExactly("[test] a");
        expect(info).to.have.been.calledOnceWithExactly("[test] b");
        expect(warn).to.have.been.calledOnceWithExactly("[test] [warn] c");
        expect(error).to.have.been.calledOnceWithExactly("[test] [error] d");
    });
    it("uses the package name as the default prefix", () => {
        const debug = stub(console, "debug");
        try {
            consoleLogger().log("hello");
        } finally {
            debug.restore();
        }
        expect(debug).to.have.been.calledOnceWithExactly("[derive-graph] hello");
    });
});

describe("nullLogger", () => {
    it("accepts every level", () => {
        expect(() => { nullLogger.log("x"); nullLogger.info("y"); nullLogger.warn("z"); nullLogger.error("w"); })
            .to.not.throw();
    });
});
