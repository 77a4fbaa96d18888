/**
 * A {@link ComputationState} holding the value a node computed.
 *
 * `fromAsync` is true if the value came from an async node, or was computed
 * from one (directly or indirectly), so observers that only understand the
 * async wrapper still see the value as async-derived.
 *
 * @category Types and Interfaces
 */
export type ReadyState<T> = {op: "ready", val: T, err: undefined, fromAsync: boolean};

/**
 * A {@link ComputationState} for a node whose value is still being produced,
 * by its own background task or one it depends on.
 *
 * @category Types and Interfaces
 */
export type LoadingState = {op: "loading", val: undefined, err: undefined, fromAsync: true};

/**
 * A {@link ComputationState} for a node whose compute function (or one it
 * depends on) failed.
 *
 * @category Types and Interfaces
 */
export type FailedState = {op: "failed", val: undefined, err: unknown, fromAsync: boolean};

/**
 * The state stored for a node in a {@link FieldStore}.  Nodes have no state
 * at all until their first computation pass, and each later pass overwrites
 * the previous state.
 *
 * You can inspect a state using {@link isReady}(), {@link isLoading}() and
 * {@link isFailed}(), or unwrap it with {@link getValue}().
 *
 * @category Types and Interfaces
 */
export type ComputationState<T = unknown> = ReadyState<T> | LoadingState | FailedState;

/**
 * The state used for every loading node.
 *
 * @category States
 */
export const Loading: LoadingState = Object.freeze({op: "loading", val: undefined, err: undefined, fromAsync: true});

/**
 * Create a {@link ReadyState} from a value
 *
 * @category States
 */
export function Ready<T>(val: T, fromAsync = false): ReadyState<T> {
    return {op: "ready", val, err: undefined, fromAsync};
}

/**
 * Create a {@link FailedState} from an error
 *
 * @category States
 */
export function Failed(err: unknown, fromAsync = false): FailedState {
    return {op: "failed", val: undefined, err, fromAsync};
}

/**
 * Returns true if the given state is a {@link ReadyState}.
 *
 * @category States
 */
export function isReady<T>(state: ComputationState<T> | undefined): state is ReadyState<T> {
    return state ? state.op === "ready" : false;
}

/**
 * Returns true if the given state is the {@link Loading} state.
 *
 * @category States
 */
export function isLoading(state: ComputationState | undefined): state is LoadingState {
    return state ? state.op === "loading" : false;
}

/**
 * Returns true if the given state is a {@link FailedState}.
 *
 * @category States
 */
export function isFailed(state: ComputationState | undefined): state is FailedState {
    return state ? state.op === "failed" : false;
}

/**
 * Run a compute function, turning a thrown error into a {@link FailedState}
 * instead of letting it escape.
 *
 * @category States
 */
export function attempt<T>(fn: () => T, fromAsync = false): ReadyState<T> | FailedState {
    try {
        return Ready(fn(), fromAsync);
    } catch (e) {
        return Failed(e, fromAsync);
    }
}

/**
 * Get the value from a {@link ComputationState}, throwing the failure reason
 * if it's a {@link FailedState}, or a {@link StillLoading} error if the state
 * is {@link Loading}.  An absent state unwraps to `undefined`.
 *
 * @category States
 */
export function getValue<T>(state: ComputationState<T> | undefined): T | undefined {
    if (!state) return undefined;
    if (state.op === "failed") throw state.err;
    if (state.op === "loading") throw new StillLoading("Value is still loading");
    return state.val;
}

/**
 * Error thrown by {@link getValue}() when unwrapping a {@link Loading} state.
 *
 * @category Errors
 */
export class StillLoading extends Error {}
