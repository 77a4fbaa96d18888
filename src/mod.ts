/**
 * Incremental recomputation of derived values.
 *
 * An {@link Owner} holds mutable fields and a graph of nodes built from
 * declarations ({@link derive}, {@link read}, {@link query} and {@link form}).
 * Changing a field reruns only the nodes that depend on it, in dependency
 * order; async nodes run in the background and show as {@link Loading} until
 * their result arrives, and failures propagate to dependents as
 * {@link Failed} states instead of throwing.
 *
 * @module derive-graph
 */

export { defer } from "./defer.ts";
export * from "./types.ts";
export * from "./states.ts";
export * from "./errors.ts";
export * from "./refs.ts";
export * from "./builder.ts";
export * from "./schedule.ts";
export * from "./invalidation.ts";
export * from "./executor.ts";
export * from "./router.ts";
export * from "./store.ts";
export * from "./owner.ts";
export * from "./topics.ts";
export * from "./logger.ts";
export * from "./scheduling.ts";
export * as fieldTypes from "./field-types.ts";
export type { FieldType } from "./field-types.ts";
