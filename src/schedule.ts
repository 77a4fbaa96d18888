import { CircularDependency } from "./errors.ts";
import type { Node } from "./types.ts";

const InProgress = -1;

/**
 * Order a set of nodes so each comes after every node it depends on.
 *
 * Each node's depth is the length of its longest chain of dependencies
 * *within the given set*: 0 for a node with no dependencies in the set, else
 * one more than the deepest of them.  Nodes are returned by ascending depth;
 * nodes of equal depth keep their input order.
 *
 * @throws {@link CircularDependency} if the nodes' dependencies form a cycle,
 * naming the nodes along it.
 *
 * @category Scheduling
 */
export function order<N extends Node<unknown>>(nodes: Iterable<N>): N[] {
    const list = Array.from(nodes), byName = new Map<string, N>();
    for (const node of list) byName.set(node.name, node);

    // depth per name, or InProgress while its dependencies are being visited
    const depths = new Map<string, number>(), path: string[] = [];

    function depth(node: N): number {
        const known = depths.get(node.name);
        if (known === InProgress) {
            throw new CircularDependency([...path.slice(path.indexOf(node.name)), node.name]);
        }
        if (known !== undefined) return known;
        depths.set(node.name, InProgress);
        path.push(node.name);
        let d = 0;
        for (const dep of node.dependsOn) {
            const depNode = byName.get(dep);
            if (depNode) d = Math.max(d, 1 + depth(depNode));
        }
        path.pop();
        depths.set(node.name, d);
        return d;
    }

    const keyed = list.map((node, pos) => ({node, pos, depth: depth(node)}));
    keyed.sort((a, b) => a.depth - b.depth || a.pos - b.pos);
    return keyed.map(k => k.node);
}
