/**
 * Small helpers shared by the builder and the owner.
 *
 * @module
 */

/**
 * Is the given value a function?
 *
 * @category Utilities
 */
export function isFunction(f: unknown): f is (...args: unknown[]) => unknown {
    return typeof f === "function";
}

/**
 * Is the given value a promise, or something with a promise-like `then()`?
 *
 * @category Utilities
 */
export function isPromiseLike(v: unknown): v is PromiseLike<unknown> {
    return (typeof v === "object" || typeof v === "function") && v !== null && "then" in v && isFunction(v.then);
}

/**
 * Is the given value a non-null, non-array object?
 *
 * @category Utilities
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Apply `fn` to a value, or to the value of a promise once it resolves.
 *
 * @category Utilities
 */
export function mapMaybe<T>(v: unknown, fn: (v: unknown) => T): T | Promise<T> {
    return isPromiseLike(v) ? Promise.resolve(v).then(fn) : fn(v);
}
