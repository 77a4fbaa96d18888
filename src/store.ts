import { MissingField } from "./errors.ts";
import { dump, parse } from "./field-types.ts";
import type { ComputationState } from "./states.ts";
import type { FieldDef, FieldStore, StorageClass } from "./types.ts";

/**
 * Where {@link MemoryStore.hydrate} reads field values from.
 *
 * @category Types and Interfaces
 */
export interface HydrateSources {
    /** URL params, for `url` fields */
    readonly url?: Readonly<Record<string, string | undefined>>;
    /** Client-side state restored on reconnect, for `socket` fields */
    readonly socket?: Readonly<Record<string, string | null | undefined>>;
}

/**
 * An in-memory {@link FieldStore}: one per owner.
 *
 * Besides the interface the engine needs, it knows each field's
 * {@link StorageClass}, so it can hydrate fields from URL params or client
 * state, and flag when a url or socket field changes so the caller can push
 * the new value back out.
 *
 * @category Stores
 */
export class MemoryStore implements FieldStore {
    protected readonly fields = new Map<string, unknown>();
    protected readonly props = new Map<string, unknown>();
    protected readonly states = new Map<string, ComputationState>();
    protected readonly defs = new Map<string, FieldDef>();
    protected _dirty = new Set<string>();
    protected readonly _changed = new Set<StorageClass>();

    constructor(defs: Iterable<FieldDef> = []) {
        for (const def of defs) this.defs.set(def.name, def);
    }

    /** A prop wins over a field of the same name: the parent has the last word. */
    getField(name: string): unknown {
        return this.props.has(name) ? this.props.get(name) : this.fields.get(name);
    }

    hasField(name: string) {
        return this.fields.has(name) || this.props.has(name) || this.defs.has(name);
    }

    getNodeState(name: string) {
        return this.states.get(name);
    }

    putNodeState(name: string, state: ComputationState) {
        this.states.set(name, state);
    }

    dirty(): ReadonlySet<string> {
        return this._dirty;
    }

    /** Replaces the dirty set, so a set returned by dirty() isn't changed */
    clearDirty() {
        this._dirty = new Set;
    }

    markDirty(name: string) {
        this._dirty.add(name);
    }

    /** Set a field's value and mark it dirty */
    setField(name: string, value: unknown) {
        const old = this.fields.get(name), storage = this.defs.get(name)?.storage;
        this.fields.set(name, value);
        this.markDirty(name);
        if (storage && storage !== "ephemeral" && !Object.is(old, value)) this._changed.add(storage);
    }

    /**
     * Store props from the owner's parent, marking the ones whose value
     * changed as dirty.  Props that are omitted keep their current value.
     */
    setProps(props: Readonly<Record<string, unknown>>) {
        for (const [name, value] of Object.entries(props)) {
            if (this.props.has(name) && Object.is(this.props.get(name), value)) continue;
            this.props.set(name, value);
            this.markDirty(name);
        }
    }

    /** Has a field of the given storage class changed since the flag was cleared? */
    changed(storage: StorageClass) {
        return this._changed.has(storage);
    }

    clearChanged(storage: StorageClass) {
        this._changed.delete(storage);
    }

    /**
     * Give every declared field its initial value: url fields from URL params,
     * socket fields from client state, and anything else (or anything
     * missing) from its default.  Ephemeral fields that already have a value
     * keep it.  Hydrating doesn't mark anything dirty: it's followed by a full
     * pass.
     *
     * @throws {@link MissingField} if a required url field isn't in the params
     * @throws Error if a url or socket value can't be parsed as its type
     */
    hydrate(sources: HydrateSources = {}) {
        for (const def of this.defs.values()) {
            switch (def.storage) {
                case "url": {
                    const raw = sources.url?.[def.name];
                    if (raw === undefined && def.required) throw new MissingField(def.name);
                    this.fields.set(def.name, raw === undefined ? def.default : this.decode(def, raw));
                    break;
                }
                case "socket": {
                    const raw = sources.socket?.[def.name];
                    const useDefault = raw == null || (raw === "" && (def.type ?? "string") !== "string");
                    this.fields.set(def.name, useDefault ? def.default : this.decode(def, raw));
                    break;
                }
                case "ephemeral":
                    if (!this.fields.has(def.name)) this.fields.set(def.name, def.default);
                    break;
            }
        }
    }

    protected decode(def: FieldDef, raw: string) {
        const res = parse(def.type ?? "string", raw);
        if (!res.ok) throw new Error(`${def.name}: ${res.error}`);
        return res.value;
    }

    /**
     * Encode the fields of a storage class as strings, for pushing to the URL
     * or client.  For url fields, values that are nullish or that encode the
     * same as the field's default are left out, so the URL stays short.
     */
    dump(storage: StorageClass): Record<string, string> {
        const out: Record<string, string> = {};
        for (const def of this.defs.values()) {
            if (def.storage !== storage) continue;
            const value = this.fields.get(def.name), type = def.type ?? "string";
            const encoded = dump(type, value);
            if (storage === "url" && (value == null || encoded === dump(type, def.default))) continue;
            out[def.name] = encoded;
        }
        return out;
    }

    /**
     * All fields, props and node values as one record.  Ready nodes show their
     * value; loading and failed nodes show their state.
     */
    snapshot(): Record<string, unknown> {
        const out: Record<string, unknown> = {};
        for (const [name, value] of this.fields) out[name] = value;
        for (const [name, value] of this.props) out[name] = value;
        for (const [name, state] of this.states) out[name] = state.op === "ready" ? state.val : state;
        return out;
    }
}
