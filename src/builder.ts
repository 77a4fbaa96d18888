import { BuildError, DuplicateName, NotFound, UnresolvedReference } from "./errors.ts";
import { affected } from "./invalidation.ts";
import { type Names, type Ref, refString, resolveRef } from "./refs.ts";
import { order } from "./schedule.ts";
import type { ComputeFn, DepValues, Draft, DraftOptions, FieldDef, Node, ResourceAccess } from "./types.ts";
import { isPromiseLike, isRecord, mapMaybe } from "./utils.ts";

/**
 * A node computed by an arbitrary function of its dependencies.
 *
 * @category Declarations
 */
export interface DeriveDecl<T = unknown> {
    readonly kind: "derive";
    readonly name: string;
    readonly dependsOn: readonly Ref[];
    readonly compute: ComputeFn<T>;
    /** Default: false */
    readonly async?: boolean;
    /** Resources the compute function reads, for resource invalidation */
    readonly reads?: readonly string[];
}

/**
 * A node that loads one record of a resource by id.  A null id, or a
 * {@link NotFound} from the access layer, gives a null value.
 *
 * @category Declarations
 */
export interface ReadDecl {
    readonly kind: "read";
    readonly name: string;
    readonly resource: string;
    readonly id: Ref;
    /** Default: "read" */
    readonly action?: string;
    /** Default: true */
    readonly async?: boolean;
}

/**
 * Where a query argument comes from: the field, prop or node named by
 * `source` (default: the argument's own name), optionally transformed.
 *
 * @category Declarations
 */
export interface ArgumentSpec {
    readonly source?: Ref;
    readonly transform?: (value: unknown) => unknown;
}

/**
 * A node that runs a resource action with arguments mapped from fields,
 * props or other nodes.  With `options`, each returned row becomes a
 * `{label, value}` pair (e.g. for a select input).
 *
 * @category Declarations
 */
export interface QueryDecl {
    readonly kind: "query";
    readonly name: string;
    readonly resource: string;
    /** Default: "read" */
    readonly action?: string;
    readonly arguments?: Readonly<Record<string, Ref | ArgumentSpec>>;
    readonly options?: {readonly label: string, readonly value?: string};
    /** Default: true */
    readonly async?: boolean;
}

/**
 * A node that builds a create-or-update {@link Draft} for a resource from
 * form params and (optionally) an existing record.
 *
 * @category Declarations
 */
export interface FormDecl {
    readonly kind: "form";
    readonly name: string;
    readonly resource: string;
    /** The record to update; without it (or when it's null) the draft creates */
    readonly data?: Ref;
    /**
     * Default: the field named `<name>_params`.  If no field, prop or node
     * has that name, it's an implicit ephemeral field; see
     * {@link implicitFields}().
     */
    readonly params?: Ref;
    /** Default: "create" */
    readonly create?: string;
    /** Default: "update" */
    readonly update?: string;
}

/**
 * Any node declaration accepted by {@link build}()
 *
 * @category Declarations
 */
export type Declaration = DeriveDecl | ReadDecl | QueryDecl | FormDecl;

/** @category Declarations */
export function derive<T>(
    name: string, dependsOn: readonly Ref[], compute: ComputeFn<T>,
    opts: {async?: boolean, reads?: readonly string[]} = {}
): DeriveDecl<T> {
    return {kind: "derive", name, dependsOn, compute, ...opts};
}

/** @category Declarations */
export function read(name: string, resource: string, id: Ref, opts: {action?: string, async?: boolean} = {}): ReadDecl {
    return {kind: "read", name, resource, id, ...opts};
}

/** @category Declarations */
export function query(name: string, resource: string, opts: Omit<QueryDecl, "kind" | "name" | "resource"> = {}): QueryDecl {
    return {kind: "query", name, resource, ...opts};
}

/** @category Declarations */
export function form(name: string, resource: string, opts: Omit<FormDecl, "kind" | "name" | "resource"> = {}): FormDecl {
    return {kind: "form", name, resource, ...opts};
}

/**
 * What a graph is built against: the owner's field and prop names, and the
 * access layer read, query and form nodes call.
 *
 * @category Types and Interfaces
 */
export interface BuildScope {
    readonly fields?: Iterable<string>;
    readonly props?: Iterable<string>;
    readonly resources?: ResourceAccess;
}

/**
 * Build a {@link Graph} from a list of declarations.
 *
 * @throws {@link DuplicateName} if a node name is used twice or clashes with a
 * field or prop
 * @throws {@link UnresolvedReference} if a dependency can't be resolved
 * @throws {@link CircularDependency} if the nodes' dependencies form a cycle
 * @throws {@link BuildError} if a read or query is declared without a
 * matching resource access layer
 *
 * @category Graphs
 */
export function build(declarations: readonly Declaration[], scope: BuildScope = {}): Graph {
    const fields = new Set(scope.fields), props = new Set(scope.props), nodes = new Set<string>();
    for (const def of implicitFields(declarations, scope)) fields.add(def.name);
    for (const {name} of declarations) {
        if (nodes.has(name) || fields.has(name) || props.has(name)) throw new DuplicateName(name);
        nodes.add(name);
    }
    const names: Names = {fields, props, nodes};
    return new Graph(declarations.map(decl => expand(decl, names, scope.resources)));
}

/**
 * The fields a list of declarations uses without anyone declaring them: the
 * `<name>_params` field of each form that has no explicit `params`, unless a
 * field, prop or node already has that name.  Each is ephemeral, with an
 * empty record as its default.
 *
 * An {@link Owner} adds these to its store; {@link build}() treats them as
 * declared fields.
 *
 * @category Graphs
 */
export function implicitFields(declarations: readonly Declaration[], scope: BuildScope = {}): FieldDef[] {
    const taken = new Set([...scope.fields ?? [], ...scope.props ?? [], ...declarations.map(d => d.name)]);
    const out: FieldDef[] = [];
    for (const decl of declarations) {
        if (decl.kind !== "form" || decl.params !== undefined) continue;
        const name = paramsField(decl);
        if (taken.has(name)) continue;
        taken.add(name);
        out.push({name, storage: "ephemeral", default: {}});
    }
    return out;
}

function paramsField(decl: FormDecl) {
    return `${decl.name}_params`;
}

/**
 * Turn any kind of declaration into a {@link Node}
 *
 * @category Graphs
 */
export function expand(decl: Declaration, names: Names, resources?: ResourceAccess): Node {
    const dep = (r: Ref) => {
        const resolved = resolveRef(r, names);
        if (resolved === undefined) throw new UnresolvedReference(decl.name, refString(r));
        return resolved;
    };
    switch (decl.kind) {
        case "derive":
            return {
                name: decl.name, dependsOn: decl.dependsOn.map(dep), async: !!decl.async,
                compute: decl.compute, reads: decl.reads ?? [],
            };
        case "read": {
            const access = needAccess(decl.name, resources, "fetchById");
            const idName = dep(decl.id), {resource} = decl, action = decl.action ?? "read";
            return {
                name: decl.name, dependsOn: [idName], async: decl.async !== false, reads: [resource],
                compute: deps => {
                    const id = deps[idName];
                    return id == null ? null : fetchOrNull(access, resource, id, action);
                },
            };
        }
        case "query": {
            const access = needAccess(decl.name, resources, "query");
            const runQuery = access.query;
            if (!runQuery) throw new BuildError(`${decl.name}: resource access has no query()`, decl.name);
            const {resource, options} = decl, action = decl.action ?? "read";
            const mapping = Object.entries(decl.arguments ?? {}).map(([arg, spec]) => {
                const source = isArgumentSpec(spec) ? spec.source ?? arg : spec;
                const transform = isArgumentSpec(spec) ? spec.transform : undefined;
                return {arg, source: dep(source), transform};
            });
            return {
                name: decl.name, dependsOn: [...new Set(mapping.map(m => m.source))],
                async: decl.async !== false, reads: [resource],
                compute: deps => {
                    const args: Record<string, unknown> = {};
                    for (const {arg, source, transform} of mapping) {
                        args[arg] = transform ? transform(deps[source]) : deps[source];
                    }
                    const rows = runQuery.call(access, resource, action, args);
                    return options ? mapMaybe(rows, r => toOptions(r, options.label, options.value ?? "id")) : rows;
                },
            };
        }
        case "form": {
            const dataName = decl.data === undefined ? undefined : dep(decl.data);
            const paramsName = dep(decl.params ?? paramsField(decl));
            const {resource} = decl, opts: DraftOptions = {
                create: decl.create ?? "create", update: decl.update ?? "update", as: decl.name
            };
            return {
                name: decl.name, async: false, reads: [resource],
                dependsOn: dataName === undefined ? [paramsName] : [dataName, paramsName],
                compute: (deps: DepValues) => {
                    const raw = deps[paramsName], params = isRecord(raw) ? raw : {};
                    const data = dataName === undefined ? null : deps[dataName] ?? null;
                    return resources?.buildDraft ?
                        resources.buildDraft(resource, data, params, opts) :
                        draftFor(resource, data, params, opts);
                },
            };
        }
    }
}

function needAccess(node: string, resources: ResourceAccess | undefined, what: string): ResourceAccess {
    if (!resources) throw new BuildError(`${node}: no resource access for ${what}()`, node);
    return resources;
}

function isArgumentSpec(spec: Ref | ArgumentSpec): spec is ArgumentSpec {
    return typeof spec === "object" && !("ref" in spec);
}

function fetchOrNull(access: ResourceAccess, resource: string, id: unknown, action: string): unknown {
    const nullIfMissing = (e: unknown) => { if (e instanceof NotFound) return null; throw e; };
    let res: unknown;
    try {
        res = access.fetchById(resource, id, action);
    } catch (e) {
        return nullIfMissing(e);
    }
    return isPromiseLike(res) ? Promise.resolve(res).then(undefined, nullIfMissing) : res;
}

function toOptions(rows: unknown, label: string, value: string) {
    if (!Array.isArray(rows)) throw new TypeError("Query with options must return a list of records");
    return rows.map(row => isRecord(row) ? {label: row[label], value: row[value]} : {label: row, value: row});
}

/**
 * Build a {@link Draft}: an update of `data` if it's a record with a non-null
 * `id`, or a create otherwise.
 *
 * @category Graphs
 */
export function draftFor(resource: string, data: unknown, params: Readonly<Record<string, unknown>>, opts: DraftOptions): Draft {
    const update = isRecord(data) && data.id != null;
    return {
        resource, params, name: opts.as,
        type: update ? "update" : "create",
        action: update ? opts.update : opts.create,
        data: update ? data : null,
    };
}

/**
 * The nodes of one owner, with their dependencies resolved.
 *
 * @category Graphs
 */
export class Graph {
    protected readonly byName = new Map<string, Node>();
    protected readonly sorted: readonly Node[];

    /**
     * @throws {@link CircularDependency} if the nodes' dependencies form a cycle
     */
    constructor(readonly nodes: readonly Node[]) {
        for (const node of nodes) this.byName.set(node.name, node);
        this.sorted = order(nodes);
    }

    get(name: string) { return this.byName.get(name); }

    has(name: string) { return this.byName.has(name); }

    /** Nodes (all of them, by default) in dependency order */
    order(subset?: Iterable<Node>): Node[] {
        return subset ? order(subset) : [...this.sorted];
    }

    /** The nodes affected by the dirty names, in dependency order */
    affected(dirty: ReadonlySet<string>, includeSelf: boolean): Node[] {
        return order(affected(this.nodes, dirty, includeSelf));
    }

    /** Names of the nodes that read the given resource */
    namesForResource(resource: string): string[] {
        return this.nodes.filter(node => node.reads.includes(resource)).map(node => node.name);
    }
}
