import { describe, expect, it } from "./dev_deps.ts";
import { isFunction, isPromiseLike, isRecord, mapMaybe } from "../src/utils.ts";

describe("Utilities", () => {
    describe("isFunction()", () => {
        it("detects functions", () => {
            expect(isFunction(() => 1)).to.be.true;
            expect(isFunction(class {})).to.be.true;
            expect(isFunction({})).to.be.false;
            expect(isFunction(null)).to.be.false;
        });
    });
    describe("isPromiseLike()", () => {
        it("detects anything with a then() method", () => {
            expect(isPromiseLike(Promise.resolve(1))).to.be.true;
            expect(isPromiseLike({then() {}})).to.be.true;
            expect(isPromiseLike({then: 42})).to.be.false;
            expect(isPromiseLike(null)).to.be.false;
            expect(isPromiseLike("then")).to.be.false;
        });
    });
    describe("isRecord()", () => {
        it("accepts plain objects only", () => {
            expect(isRecord({a: 1})).to.be.true;
            expect(isRecord([])).to.be.false;
            expect(isRecord(null)).to.be.false;
            expect(isRecord("x")).to.be.false;
        });
    });
    describe("mapMaybe()", () => {
        it("applies a function to a plain value at once", () => {
            expect(mapMaybe(2, v => Number(v) * 2)).to.equal(4);
        });
        it("applies a function to a promise's value when it resolves", async () => {
            const res = mapMaybe(Promise.resolve(3), v => Number(v) * 2);
            expect(isPromiseLike(res)).to.be.true;
            expect(await res).to.equal(6);
        });
    });
});
