import { type Declaration, type Graph, build, implicitFields } from "./builder.ts";
import { runPass } from "./executor.ts";
import { type Logger, nullLogger } from "./logger.ts";
import { type Delivery, type OwnerAddress, type Recipient, Router, addressKey, viewAddress } from "./router.ts";
import { type Inbox, inbox } from "./scheduling.ts";
import { type ComputationState, Failed, Ready, getValue, isFailed } from "./states.ts";
import { type HydrateSources, MemoryStore } from "./store.ts";
import type { DepValues, DisposeFn, FieldDef, Node, ResourceAccess } from "./types.ts";

/**
 * Configuration for an {@link Owner}
 *
 * @category Types and Interfaces
 */
export interface OwnerOptions {
    /** Default: a fresh view address */
    readonly address?: OwnerAddress;
    /**
     * Routes task results back to this owner.  Owners that should be able
     * to reach each other (a view and its components) share one.  Default: a
     * new router of the owner's own.
     */
    readonly router?: Router;
    /** Default: {@link nullLogger} */
    readonly logger?: Logger;
    /** The access layer for read, query and form declarations */
    readonly resources?: ResourceAccess;
    readonly fields?: readonly FieldDef[];
    /** Names of the props the owner's parent supplies */
    readonly props?: readonly string[];
    /** How to schedule inbox processing; default: {@link defer} */
    readonly schedule?: (cb: () => unknown) => unknown;
}

type Message =
    | {readonly type: "full"}
    | {readonly type: "dirty"}
    | {readonly type: "delivery", readonly delivery: Delivery}
;

var nextView = 1;

/**
 * A single view or component instance: it owns one {@link MemoryStore} and
 * one {@link Graph}, and runs its own recomputation passes.
 *
 * An owner handles one thing at a time.  Passes, external invalidations and
 * async results all go through its inbox and are processed in order, so a
 * pass never starts while another is running (even if a compute function
 * changes the owner's fields).
 *
 * Every pass gets a new generation number, and each node computed in a pass
 * is stamped with it.  A background task carries the generation it was
 * spawned in; if the node has been recomputed since, the task's result is
 * discarded when it arrives.
 *
 * @category Owners
 */
export class Owner implements Recipient {
    readonly store: MemoryStore;
    readonly graph: Graph;
    readonly address: OwnerAddress;

    protected readonly propNames: ReadonlySet<string>;
    protected readonly router: Router;
    protected readonly logger: Logger;
    protected readonly inbox: Inbox<Message>;
    protected generation = 0;
    protected readonly stamps = new Map<string, number>();
    protected readonly tasks = new Set<Promise<void>>();
    protected readonly cleanups: DisposeFn[] = [];
    protected _mounted = false;
    protected _ended = false;

    /**
     * @throws {@link BuildError} (or a subclass) if the declarations don't
     * form a valid graph
     */
    constructor(declarations: readonly Declaration[], opts: OwnerOptions = {}) {
        const declared = opts.fields ?? [];
        const fields = [
            ...declared,
            ...implicitFields(declarations, {fields: declared.map(f => f.name), props: opts.props}),
        ];
        this.propNames = new Set(opts.props);
        this.logger = opts.logger ?? nullLogger;
        this.address = opts.address ?? viewAddress(`view-${nextView++}`);
        this.router = opts.router ?? new Router(this.logger);
        this.store = new MemoryStore(fields);
        this.graph = build(declarations, {
            fields: fields.map(f => f.name), props: opts.props, resources: opts.resources
        });
        this.inbox = inbox(msg => this.handle(msg), opts.schedule);
    }

    /**
     * Hydrate the fields, store the initial props, register with the router,
     * and compute every node.
     *
     * @throws {@link MissingField} if a required url field is missing
     */
    mount(sources?: HydrateSources, props?: Readonly<Record<string, unknown>>): this {
        if (this._mounted || this._ended) return this;
        this.store.hydrate(sources);
        if (props) this.store.setProps(props);
        this.store.clearDirty();
        this._mounted = true;
        this.must(this.router.register(this.address, this));
        this.run({type: "full"});
        return this;
    }

    /** Stop accepting messages: results of tasks still running are dropped. */
    end() {
        if (this._ended) return;
        this._ended = true;
        for (const cleanup of this.cleanups.splice(0).reverse()) cleanup();
    }

    /** Add a function to be called when the owner ends */
    must(cleanup: DisposeFn): this {
        if (this._ended) cleanup(); else this.cleanups.push(cleanup);
        return this;
    }

    isEnded() { return this._ended; }

    /**
     * Set a field and mark it dirty, without recomputing anything yet.
     *
     * @throws Error if the name belongs to a node or a prop
     */
    set(name: string, value: unknown): this {
        if (this.graph.has(name)) throw new Error(`${name} is a derived node, not a field`);
        if (this.propNames.has(name)) throw new Error(`${name} is a prop, set by the owner's parent`);
        this.store.setField(name, value);
        return this;
    }

    /** Set several fields, then recompute the nodes they affect. */
    update(changes: Readonly<Record<string, unknown>>): this {
        for (const [name, value] of Object.entries(changes)) this.set(name, value);
        return this.recompute();
    }

    /** Store new props from the parent, then recompute what changed props affect. */
    setProps(props: Readonly<Record<string, unknown>>): this {
        this.store.setProps(props);
        return this.recompute();
    }

    /** Recompute the nodes affected by everything marked dirty so far. */
    recompute(): this {
        this.run({type: "dirty"});
        return this;
    }

    /**
     * Mark names dirty on behalf of something outside the owner (such as
     * another process changing a resource), and recompute.  Unlike a field
     * change, any invalidated *nodes* are rerun themselves, as well as their
     * dependents.
     */
    invalidate(names: Iterable<string>): this {
        for (const name of names) this.store.markDirty(name);
        return this.recompute();
    }

    /** Rerun the nodes that read a resource, and everything depending on them. */
    invalidateResource(resource: string): this {
        const names = this.graph.namesForResource(resource);
        return names.length ? this.invalidate(names) : this;
    }

    /** Accept a task result (called by the {@link Router}). */
    receive(delivery: Delivery) {
        this.run({type: "delivery", delivery});
    }

    /** The current state of a node (undefined before its first pass) */
    state(name: string): ComputationState | undefined {
        return this.store.getNodeState(name);
    }

    /**
     * The current value of a field, prop or node.  Throws if the node is
     * loading or failed; see {@link getValue}().
     */
    value(name: string): unknown {
        return this.graph.has(name) ? getValue(this.state(name)) : this.store.getField(name);
    }

    snapshot() {
        return this.store.snapshot();
    }

    /**
     * Wait until no background task is running and every pending message has
     * been handled.
     */
    async settled(): Promise<void> {
        while (this.tasks.size) await Promise.all(this.tasks);
        this.inbox.flush();
    }

    protected run(msg: Message) {
        this.inbox.post(msg);
        this.inbox.flush();
    }

    protected handle(msg: Message) {
        if (this._ended || !this._mounted) return;
        switch (msg.type) {
            case "full":
                return this.pass(this.graph.order(), "full");
            case "dirty": {
                const dirty = this.store.dirty();
                if (!dirty.size) return;
                this.store.clearDirty();
                return this.pass(this.graph.affected(dirty, true), `dirty: ${[...dirty].join(", ")}`);
            }
            case "delivery":
                return this.deliver(msg.delivery);
        }
    }

    protected deliver({node, result, generation}: Delivery) {
        const stamp = this.stamps.get(node);
        if (stamp === undefined) {
            this.logger.warn(`${addressKey(this.address)}: result for unknown node ${node}`);
            return;
        }
        if (stamp !== generation) {
            this.logger.info(`${node}: discarding result from pass ${generation}, superseded by pass ${stamp}`);
            return;
        }
        if (isFailed(result)) this.logger.warn(`${node} failed: ${String(result.err)}`);
        this.store.putNodeState(node, result);
        this.pass(this.graph.affected(new Set([node]), false), `dependents of ${node}`);
    }

    protected pass(nodes: readonly Node[], why: string) {
        if (!nodes.length) return;
        const generation = ++this.generation;
        this.logger.log(`pass ${generation} (${why}): ${nodes.map(n => n.name).join(", ")}`);
        for (const node of nodes) this.stamps.set(node.name, generation);
        runPass(nodes, this.store, (node, deps, pending) => this.spawn(node, deps, generation, pending));
        const failed = nodes.filter(n => isFailed(this.store.getNodeState(n.name)));
        if (failed.length) this.logger.warn(`pass ${generation}: failed: ${failed.map(n => n.name).join(", ")}`);
    }

    protected spawn(node: Node, deps: DepValues, generation: number, pending?: PromiseLike<unknown>) {
        const task: Promise<void> = Promise.resolve()
            .then(() => pending ?? node.compute(deps))
            .then(val => Ready(val, true), (err: unknown) => Failed(err, true))
            .then(result => { this.router.deliver(this.address, node.name, result, generation); })
            .catch((e: unknown) => { this.logger.error(`delivering ${node.name}: ${String(e)}`); })
            .finally(() => { this.tasks.delete(task); });
        this.tasks.add(task);
    }
}
