import type { Node } from "./types.ts";

/**
 * Find the nodes that must be recomputed after the names in `dirty` changed.
 *
 * A node is directly affected if it depends on a dirty name, or (when
 * `includeSelf` is true) if its own name is dirty.  Then any node depending on
 * an affected node is affected too, until nothing more is added.  Only node
 * names are followed: a dirty field's dependents are found in the first step
 * and fields are never added back in.
 *
 * `includeSelf` only applies to the first step.  Delivering an async result
 * marks the finished node dirty *without* it, so only its dependents rerun;
 * invalidating a resource marks its nodes dirty *with* it, so they rerun too.
 *
 * @returns the affected nodes, in the order they appear in `allNodes`
 *
 * @category Invalidation
 */
export function affected<N extends Node<unknown>>(
    allNodes: readonly N[], dirty: ReadonlySet<string>, includeSelf: boolean
): N[] {
    const names = new Set<string>();
    for (const node of allNodes) {
        if (node.dependsOn.some(dep => dirty.has(dep)) || (includeSelf && dirty.has(node.name))) {
            names.add(node.name);
        }
    }
    for (let added = names.size > 0; added; ) {
        added = false;
        for (const node of allNodes) {
            if (!names.has(node.name) && node.dependsOn.some(dep => names.has(dep))) {
                names.add(node.name);
                added = true;
            }
        }
    }
    return allNodes.filter(node => names.has(node.name));
}
