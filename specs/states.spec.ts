import { describe, expect, it } from "./dev_deps.ts";
import { Failed, Loading, Ready, StillLoading, attempt, getValue, isFailed, isLoading, isReady } from "../src/states.ts";

describe("Computation states", () => {
    describe("guards", () => {
        it("recognize each kind of state", () => {
            expect(isReady(Ready(1))).to.be.true;
            expect(isReady(Loading)).to.be.false;
            expect(isLoading(Loading)).to.be.true;
            expect(isLoading(Failed("x"))).to.be.false;
            expect(isFailed(Failed("x"))).to.be.true;
            expect(isFailed(Ready(undefined))).to.be.false;
        });
        it("return false for an absent state", () => {
            expect(isReady(undefined)).to.be.false;
            expect(isLoading(undefined)).to.be.false;
            expect(isFailed(undefined)).to.be.false;
        });
    });
    describe("Ready()", () => {
        it("is not from async data unless flagged", () => {
            expect(Ready(3)).to.deep.equal({op: "ready", val: 3, err: undefined, fromAsync: false});
            expect(Ready(3, true).fromAsync).to.be.true;
        });
    });
    describe("Loading", () => {
        it("is frozen", () => {
            expect(Object.isFrozen(Loading)).to.be.true;
        });
    });
    describe("attempt()", () => {
        it("wraps a returned value as ready", () => {
            expect(attempt(() => 42, true)).to.deep.equal(Ready(42, true));
        });
        it("turns a thrown error into a failure", () => {
            // Given a function that throws
            const e = new Error("boom");
            // When it's attempted
            const res = attempt(() => { throw e; });
            // Then the error should be the failure's reason
            expect(isFailed(res)).to.be.true;
            expect(res.err).to.equal(e);
        });
    });
    describe("getValue()", () => {
        it("unwraps ready values and absent states", () => {
            expect(getValue(Ready("v"))).to.equal("v");
            expect(getValue(undefined)).to.be.undefined;
        });
        it("throws the reason of a failure", () => {
            expect(() => getValue(Failed(new RangeError("r")))).to.throw(RangeError, "r");
        });
        it("throws StillLoading for a loading state", () => {
            expect(() => getValue(Loading)).to.throw(StillLoading);
        });
    });
});
