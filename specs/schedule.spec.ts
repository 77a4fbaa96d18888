import { describe, expect, it } from "./dev_deps.ts";
import { order } from "../src/schedule.ts";
import { CircularDependency } from "../src/errors.ts";
import type { Node } from "../src/types.ts";

function node(name: string, ...dependsOn: string[]): Node {
    return {name, dependsOn, async: false, compute: () => name, reads: []};
}

function names(nodes: Node[]) { return nodes.map(n => n.name); }

describe("order()", () => {
    it("puts every node after the nodes it depends on", () => {
        // Given nodes listed before their dependencies
        const nodes = [node("d", "b", "c"), node("c", "a"), node("b", "a"), node("a", "field")];
        // When they're ordered
        const sorted = names(order(nodes));
        // Then each node's node-dependencies should appear strictly earlier
        for (const n of nodes) {
            for (const dep of n.dependsOn) {
                if (dep === "field") continue;
                expect(sorted.indexOf(dep)).to.be.lessThan(sorted.indexOf(n.name));
            }
        }
        expect(sorted).to.deep.equal(["a", "c", "b", "d"]);
    });
    it("orders by the longest chain, not the number of dependencies", () => {
        // Given a node with one deep dependency and one with two shallow ones
        const nodes = [node("deep", "mid"), node("wide", "x", "y"), node("mid", "x"), node("x"), node("y")];
        // Then the deep node comes last
        expect(names(order(nodes))).to.deep.equal(["x", "y", "mid", "wide", "deep"]);
    });
    it("only counts dependencies within the given set", () => {
        // Given a subset whose dependencies are outside it
        const sorted = order([node("c", "b"), node("e", "d")]);
        // Then both are at depth 0 and keep their input order
        expect(names(sorted)).to.deep.equal(["c", "e"]);
    });
    it("handles a wide diamond lattice", () => {
        // Given many layers of nodes each depending on every node of the layer before
        const nodes: Node[] = [], layers = 12, width = 4;
        for (let l = layers - 1; l >= 0; l--) {
            for (let i = 0; i < width; i++) {
                const deps = l ? Array.from({length: width}, (_, j) => `n${l - 1}_${j}`) : [];
                nodes.push(node(`n${l}_${i}`, ...deps));
            }
        }
        // When ordered, Then the layers come out in order
        const sorted = names(order(nodes));
        expect(sorted.slice(0, width)).to.deep.equal(["n0_0", "n0_1", "n0_2", "n0_3"]);
        expect(sorted.slice(-width)).to.deep.equal(["n11_0", "n11_1", "n11_2", "n11_3"]);
    });
    it("accepts any iterable", () => {
        expect(names(order(new Set([node("b", "a"), node("a")])))).to.deep.equal(["a", "b"]);
    });
    describe("with a cycle", () => {
        it("throws CircularDependency naming the cycle", () => {
            // Given A -> B -> A
            const nodes = [node("a", "b"), node("b", "a")];
            // Then ordering them should fail, naming the path around the cycle
            expect(() => order(nodes)).to.throw(CircularDependency, "Circular dependency: a -> b -> a");
        });
        it("names only the nodes on the cycle", () => {
            // Given a chain leading into a cycle
            const nodes = [node("start", "x"), node("x", "y"), node("y", "z"), node("z", "x")];
            try {
                order(nodes);
                expect.fail("should have thrown");
            } catch (e) {
                expect(e).to.be.instanceOf(CircularDependency);
                if (e instanceof CircularDependency) expect(e.cycle).to.deep.equal(["x", "y", "z", "x"]);
            }
        });
        it("detects a node depending on itself", () => {
            expect(() => order([node("me", "me")])).to.throw(CircularDependency, "me -> me");
        });
    });
});
