import { describe, expect, it } from "./dev_deps.ts";
import { MemoryStore } from "../src/store.ts";
import { MissingField } from "../src/errors.ts";
import { Failed, Loading, Ready } from "../src/states.ts";
import type { FieldDef } from "../src/types.ts";

const defs: FieldDef[] = [
    {name: "page", type: "integer", storage: "url", default: 1},
    {name: "tags", type: {array: "string"}, storage: "url"},
    {name: "sort", type: "string", storage: "socket", default: "name"},
    {name: "limit", type: "integer", storage: "socket", default: 10},
    {name: "open", type: "boolean", storage: "ephemeral", default: false},
];

describe("MemoryStore", () => {
    describe(".hydrate()", () => {
        it("parses url fields from the params, defaulting missing ones", () => {
            const store = new MemoryStore(defs);
            store.hydrate({url: {tags: "a, b,,c"}});
            expect(store.getField("page")).to.equal(1);
            expect(store.getField("tags")).to.deep.equal(["a", "b", "c"]);
        });
        it("throws for a missing required url field", () => {
            const store = new MemoryStore([{name: "id", type: "integer", storage: "url", required: true}]);
            expect(() => store.hydrate({url: {other: "1"}})).to.throw(MissingField, "Required URL field id not present");
            expect(() => store.hydrate()).to.throw(MissingField);
        });
        it("treats a field with no type as a string", () => {
            const store = new MemoryStore([{name: "q", storage: "url"}]);
            store.hydrate({url: {q: "42"}});
            expect(store.getField("q")).to.equal("42");
        });
        it("throws for a value that can't be parsed", () => {
            const store = new MemoryStore(defs);
            expect(() => store.hydrate({url: {page: "abc"}})).to.throw('page: cannot parse "abc" as integer');
        });
        it("reads socket fields from client state", () => {
            const store = new MemoryStore(defs);
            store.hydrate({socket: {sort: "price", limit: "25"}});
            expect(store.getField("sort")).to.equal("price");
            expect(store.getField("limit")).to.equal(25);
        });
        it("defaults empty socket values, except for strings", () => {
            const store = new MemoryStore(defs);
            store.hydrate({socket: {sort: "", limit: ""}});
            expect(store.getField("sort")).to.equal("");
            expect(store.getField("limit")).to.equal(10);
            store.hydrate({socket: {sort: null}});
            expect(store.getField("sort")).to.equal("name");
        });
        it("keeps ephemeral values already set", () => {
            const store = new MemoryStore(defs);
            store.hydrate();
            expect(store.getField("open")).to.be.false;
            store.setField("open", true);
            store.hydrate();
            expect(store.getField("open")).to.be.true;
        });
        it("doesn't mark anything dirty", () => {
            const store = new MemoryStore(defs);
            store.hydrate({url: {page: "2"}});
            expect([...store.dirty()]).to.deep.equal([]);
        });
    });
    describe(".setField()", () => {
        it("marks the field dirty", () => {
            const store = new MemoryStore(defs);
            store.setField("open", true);
            expect([...store.dirty()]).to.deep.equal(["open"]);
        });
        it("flags url and socket changes", () => {
            // Given a hydrated store
            const store = new MemoryStore(defs);
            store.hydrate();
            // When an ephemeral field or a url field with its current value is set
            store.setField("open", true);
            store.setField("page", 1);
            // Then nothing is flagged
            expect(store.changed("url")).to.be.false;
            // When url and socket fields change
            store.setField("page", 2);
            store.setField("sort", "price");
            // Then their storage classes are flagged until cleared
            expect(store.changed("url")).to.be.true;
            expect(store.changed("socket")).to.be.true;
            store.clearChanged("url");
            expect(store.changed("url")).to.be.false;
            expect(store.changed("socket")).to.be.true;
        });
    });
    describe(".clearDirty()", () => {
        it("doesn't change a dirty set already returned", () => {
            const store = new MemoryStore();
            store.markDirty("x");
            const dirty = store.dirty();
            store.clearDirty();
            expect([...dirty]).to.deep.equal(["x"]);
            expect(store.dirty().size).to.equal(0);
        });
    });
    describe(".setProps()", () => {
        it("marks only new or changed props dirty", () => {
            const store = new MemoryStore();
            store.setProps({a: 1, b: 2});
            store.clearDirty();
            store.setProps({a: 1, b: 3});
            expect([...store.dirty()]).to.deep.equal(["b"]);
            expect(store.getField("a")).to.equal(1);
            expect(store.hasField("b")).to.be.true;
        });
        it("win over fields of the same name", () => {
            // Given a field set under a prop's name
            const store = new MemoryStore();
            store.setProps({a: 1});
            store.setField("a", 2);
            // Then the prop is what's read, now and after the parent changes it
            expect(store.getField("a")).to.equal(1);
            store.setProps({a: 3});
            expect(store.getField("a")).to.equal(3);
            expect(store.snapshot()).to.deep.equal({a: 3});
        });
    });
    describe(".dump()", () => {
        it("leaves defaults and nulls out of the url", () => {
            const store = new MemoryStore(defs);
            store.hydrate();
            expect(store.dump("url")).to.deep.equal({});
            store.setField("page", 3);
            store.setField("tags", ["x", "y"]);
            expect(store.dump("url")).to.deep.equal({page: "3", tags: "x,y"});
        });
        it("leaves out a value that encodes the same as its default", () => {
            // Given an array field whose default is ["a"], hydrated from the URL
            const store = new MemoryStore([{name: "tags", type: {array: "string"}, storage: "url", default: ["a"]}]);
            store.hydrate({url: {tags: "a"}});
            // Then the parsed copy of the default stays out of the url
            expect(store.dump("url")).to.deep.equal({});
            // And a different value goes in
            store.setField("tags", ["a", "b"]);
            expect(store.dump("url")).to.deep.equal({tags: "a,b"});
        });
        it("dumps every socket field", () => {
            const store = new MemoryStore(defs);
            store.hydrate();
            store.setField("sort", null);
            expect(store.dump("socket")).to.deep.equal({sort: "", limit: "10"});
        });
    });
    describe(".snapshot()", () => {
        it("unwraps ready node values", () => {
            const store = new MemoryStore();
            store.setField("x", 1);
            store.putNodeState("a", Ready(2));
            store.putNodeState("b", Loading);
            const failed = Failed("no");
            store.putNodeState("c", failed);
            expect(store.snapshot()).to.deep.equal({x: 1, a: 2, b: Loading, c: failed});
        });
    });
    it("knows declared fields before they have a value", () => {
        const store = new MemoryStore(defs);
        expect(store.hasField("open")).to.be.true;
        expect(store.hasField("nope")).to.be.false;
        expect(store.getField("open")).to.be.undefined;
    });
});
