import type { ComputationState } from "./states.ts";
import type { FieldType } from "./field-types.ts";

/**
 * A function that can be called to dispose of something or unsubscribe
 * something.  It's called without arguments and returns void.
 *
 * @category Types and Interfaces
 */
export type DisposeFn = () => void;

/**
 * The plain (unwrapped) values of a node's dependencies, keyed by name.
 *
 * @category Types and Interfaces
 */
export type DepValues = Readonly<Record<string, unknown>>;

/**
 * A node's compute function.  It receives the unwrapped values of the node's
 * dependencies and returns the node's value.  For an async node it may return
 * a promise; for any node it may throw, which makes the node
 * {@link Failed}.
 *
 * @category Types and Interfaces
 */
export type ComputeFn<T = unknown> = (deps: DepValues) => T | PromiseLike<T>;

/**
 * A derived computation, as produced by {@link build}() from any kind of
 * {@link Declaration}.
 *
 * @category Types and Interfaces
 */
export interface Node<T = unknown> {
    /** Unique within the owner, and distinct from every field and prop name */
    readonly name: string;

    /** Names of the fields, props and nodes this node reads, in order */
    readonly dependsOn: readonly string[];

    /** Run compute in a background task instead of inline */
    readonly async: boolean;

    readonly compute: ComputeFn<T>;

    /**
     * External resources this node reads; used to find the nodes to rerun
     * when a resource is invalidated, never by the graph itself.
     */
    readonly reads: readonly string[];
}

/**
 * Where a field's value is kept between interactions.  The graph doesn't care;
 * a {@link MemoryStore} uses it to decide which fields hydrate from URL params
 * or client state, and which changes need to be pushed back out.
 *
 * - `url`: synchronized with the page URL
 * - `socket`: survives reconnects via client-side state
 * - `ephemeral`: lives only as long as the owner
 *
 * @category Types and Interfaces
 */
export type StorageClass = "url" | "socket" | "ephemeral";

/**
 * A named, typed, mutable input of an owner.
 *
 * @category Types and Interfaces
 */
export interface FieldDef<T = unknown> {
    readonly name: string;
    /** How url and socket values are parsed and dumped; default "string" */
    readonly type?: FieldType;
    readonly storage: StorageClass;
    readonly default?: T;
    /** A url field that must be present in the URL params */
    readonly required?: boolean;
}

/**
 * The storage an engine reads inputs from and writes node states to.  It is
 * the single source of truth for an owner: the engine keeps no copies.
 *
 * @category Types and Interfaces
 */
export interface FieldStore {
    /** Current value of a field or prop */
    getField(name: string): unknown;

    /** Is the name a field or prop (as opposed to a node or unknown)? */
    hasField(name: string): boolean;

    getNodeState(name: string): ComputationState | undefined;
    putNodeState(name: string, state: ComputationState): void;

    /** Names changed since the dirty set was last cleared */
    dirty(): ReadonlySet<string>;
    clearDirty(): void;
    markDirty(name: string): void;
}

/**
 * A create-or-update draft built by a form node.
 *
 * @category Types and Interfaces
 */
export interface Draft {
    readonly resource: string;
    readonly action: string;
    readonly type: "create" | "update";
    /** The record being updated, or null for a create */
    readonly data: unknown;
    readonly params: Readonly<Record<string, unknown>>;
    /** Name used to namespace the draft's params */
    readonly name: string;
}

/**
 * Options passed to {@link ResourceAccess.buildDraft}
 *
 * @category Types and Interfaces
 */
export interface DraftOptions {
    readonly create: string;
    readonly update: string;
    readonly as: string;
}

/**
 * The data-access layer that read, query and form nodes call into.
 *
 * `fetchById` signals a missing record by throwing (or rejecting with) a
 * {@link NotFound}, which a read node turns into a `null` value.  Any other
 * error fails the node.
 *
 * @category Types and Interfaces
 */
export interface ResourceAccess {
    fetchById(resource: string, id: unknown, action: string): unknown;
    query?(resource: string, action: string, args: Readonly<Record<string, unknown>>): unknown;
    buildDraft?(resource: string, data: unknown, params: Readonly<Record<string, unknown>>, opts: DraftOptions): unknown;
}
