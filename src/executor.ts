import { type ComputationState, type FailedState, Loading, attempt } from "./states.ts";
import type { DepValues, FieldStore, Node } from "./types.ts";
import { isPromiseLike } from "./utils.ts";

/**
 * Called by {@link computeOne}() to start an async node's compute function in
 * the background.  The caller is responsible for getting the result back to
 * the node's owner.
 *
 * If `pending` is given, compute has already been called (by a sync node that
 * returned a promise) and `pending` is its result, to be awaited in place of
 * calling compute again.
 *
 * @category Types and Interfaces
 */
export type SpawnFn = (node: Node, deps: DepValues, pending?: PromiseLike<unknown>) => void;

/**
 * Compute one node from the current states of its dependencies, and store the
 * resulting state.
 *
 * - If any dependency is {@link Loading}, the node becomes Loading.
 * - Otherwise, if any dependency failed, the node gets the state of the first
 *   failed dependency in `dependsOn` order.  (Loading wins over failure, no
 *   matter the order.)
 * - Otherwise an async node is handed to `spawn` and becomes Loading, and a
 *   sync node is computed on the spot.  Its value is marked `fromAsync` if any
 *   dependency's was; if compute throws, the node is {@link Failed} with the
 *   thrown error.  A sync node whose compute returns a promise anyway (e.g. a
 *   read declared `async: false` over an async access layer) is handed to
 *   `spawn` with that promise, and becomes Loading.
 *
 * In the first two cases the node's compute function isn't called.  A node
 * dependency with no state yet is passed to compute as `undefined`.
 *
 * @returns the state that was stored
 *
 * @category Computation
 */
export function computeOne(node: Node, store: FieldStore, spawn: SpawnFn): ComputationState {
    const values: Record<string, unknown> = {};
    let fromAsync = false, failed: FailedState | undefined;
    for (const name of node.dependsOn) {
        const state = store.getNodeState(name);
        if (!state) {
            values[name] = store.hasField(name) ? store.getField(name) : undefined;
        } else if (state.op === "loading") {
            return put(store, node, Loading);
        } else if (state.op === "failed") {
            failed ||= state;
        } else {
            values[name] = state.val;
            fromAsync ||= state.fromAsync;
        }
    }
    if (failed) return put(store, node, failed);
    if (node.async) {
        spawn(node, values);
        return put(store, node, Loading);
    }
    const state = attempt(() => node.compute(values), fromAsync);
    if (state.op === "ready" && isPromiseLike(state.val)) {
        spawn(node, values, state.val);
        return put(store, node, Loading);
    }
    return put(store, node, state);
}

function put(store: FieldStore, node: Node, state: ComputationState) {
    store.putNodeState(node.name, state);
    return state;
}

/**
 * Compute each of a list of nodes, in order.  The list should already be in
 * dependency order (e.g. from {@link order}()).
 *
 * @category Computation
 */
export function runPass(nodes: readonly Node[], store: FieldStore, spawn: SpawnFn) {
    for (const node of nodes) computeOne(node, store, spawn);
}
