/**
 * Topic names and in-process fan-out for resource invalidation.
 *
 * When a resource changes, every owner with a node reading it should rerun
 * that node.  Owners subscribe to a topic describing what they watch: the
 * whole resource, or a combination of attribute values they filter on.  A
 * mutation is broadcast to every combination of the changed record's old and
 * new attribute values, so any owner filtering on any subset of them hears
 * about it.
 *
 * Carrying broadcasts between processes is left to the caller: a transport
 * only needs to call {@link InvalidationHub.broadcast} on the receiving side.
 *
 * @module
 */
import { type Logger, nullLogger } from "./logger.ts";
import type { DisposeFn } from "./types.ts";

/**
 * Something that can be told a resource changed: usually an {@link Owner}.
 *
 * @category Types and Interfaces
 */
export interface Invalidatable {
    invalidateResource(resource: string): unknown;
}

const prefix = "derive";

/**
 * The topic for every change to a resource
 *
 * @category Topics
 */
export function resourceTopic(resource: string) {
    return `${prefix}:${resource}`;
}

/**
 * The topic for a combination of attribute values.  Attributes whose value is
 * null or undefined aren't being filtered on and are left out; attributes are
 * sorted by name.  With no attributes left, this is the resource topic.
 *
 * @category Topics
 */
export function combinationTopic(resource: string, watched: readonly string[], values: Readonly<Record<string, unknown>>) {
    const active = watched.filter(attr => values[attr] != null).sort();
    if (!active.length) return resourceTopic(resource);
    return `${prefix}:${resource}:${active.map(attr => `${attr}=${encodeValue(values[attr])}`).join("&")}`;
}

/**
 * All the topics a mutation must be broadcast to: every subset of the watched
 * attributes, for both the old and the new values, without duplicates.
 *
 * @param changes `{attr: [old, new]}` for the attributes that changed
 * @param unchanged `{attr: value}` for the watched attributes that didn't
 *
 * @category Topics
 */
export function mutationTopics(
    resource: string, watched: readonly string[],
    changes: Readonly<Record<string, readonly [unknown, unknown]>>,
    unchanged: Readonly<Record<string, unknown>> = {},
): string[] {
    const oldValues: Record<string, unknown> = {...unchanged}, newValues: Record<string, unknown> = {...unchanged};
    for (const [attr, [was, is]] of Object.entries(changes)) {
        oldValues[attr] = was;
        newValues[attr] = is;
    }
    const topics = new Set<string>();
    for (const values of [oldValues, newValues]) {
        for (const subset of powerSet(watched)) topics.add(combinationTopic(resource, subset, values));
    }
    return [...topics];
}

function powerSet<T>(items: readonly T[]): T[][] {
    if (!items.length) return [[]];
    const [head, ...tail] = items, rest = powerSet(tail);
    return [...rest, ...rest.map(subset => [head, ...subset])];
}

function encodeValue(value: unknown): string {
    if (value == null) return "";
    return typeof value === "string" ? value : String(value);
}

/**
 * Delivers resource invalidations to the owners subscribed to a topic.
 *
 * @category Topics
 */
export class InvalidationHub {
    protected readonly topics = new Map<string, Set<Invalidatable>>();

    constructor(protected readonly logger: Logger = nullLogger) {}

    /**
     * Subscribe a target to a topic.
     *
     * @returns a function that unsubscribes it
     */
    subscribe(topic: string, target: Invalidatable): DisposeFn {
        const subs = this.topics.get(topic) ?? new Set<Invalidatable>();
        this.topics.set(topic, subs);
        subs.add(target);
        return () => {
            subs.delete(target);
            if (!subs.size && this.topics.get(topic) === subs) this.topics.delete(topic);
        };
    }

    /**
     * Tell every subscriber of `topic` that `resource` changed.
     *
     * @returns the number of subscribers told
     */
    broadcast(topic: string, resource: string): number {
        return this.notify([topic], resource);
    }

    /**
     * Broadcast a mutation to all its {@link mutationTopics}().  A subscriber
     * of several of the topics is only told once.
     *
     * @returns the number of subscribers told
     */
    broadcastMutation(
        resource: string, watched: readonly string[],
        changes: Readonly<Record<string, readonly [unknown, unknown]>>,
        unchanged: Readonly<Record<string, unknown>> = {},
    ): number {
        return this.notify(mutationTopics(resource, watched, changes, unchanged), resource);
    }

    protected notify(topics: readonly string[], resource: string) {
        const targets = new Set<Invalidatable>();
        for (const topic of topics) for (const target of this.topics.get(topic) ?? []) targets.add(target);
        this.logger.log(`invalidating ${resource} for ${targets.size} subscriber(s)`);
        for (const target of targets) target.invalidateResource(resource);
        return targets.size;
    }
}
