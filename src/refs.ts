/**
 * References a declaration uses to name its dependencies.
 *
 * @module
 */

/**
 * A reference to one of an owner's fields
 *
 * @category Types and Interfaces
 */
export type FieldRef = {readonly ref: "field", readonly name: string};

/**
 * A reference to another node's result
 *
 * @category Types and Interfaces
 */
export type ResultRef = {readonly ref: "result", readonly name: string};

/**
 * A reference to a prop supplied by the owner's parent
 *
 * @category Types and Interfaces
 */
export type PropRef = {readonly ref: "prop", readonly name: string};

/**
 * Any dependency reference.  A bare string may name a field, prop or node.
 *
 * @category Types and Interfaces
 */
export type Ref = FieldRef | ResultRef | PropRef | string;

/** @category Declarations */
export function field(name: string): FieldRef { return {ref: "field", name}; }

/** @category Declarations */
export function result(name: string): ResultRef { return {ref: "result", name}; }

/** @category Declarations */
export function prop(name: string): PropRef { return {ref: "prop", name}; }

/**
 * The names an owner declares, by kind
 *
 * @category Types and Interfaces
 */
export interface Names {
    readonly fields: ReadonlySet<string>;
    readonly props: ReadonlySet<string>;
    readonly nodes: ReadonlySet<string>;
}

/** Display form of a reference, for diagnostics */
export function refString(r: Ref) {
    return typeof r === "string" ? r : `${r.ref}(${r.name})`;
}

/**
 * Resolve a reference to a bare name, or undefined if it doesn't name
 * something of the kind it asks for.
 */
export function resolveRef(r: Ref, names: Names): string | undefined {
    if (typeof r === "string") {
        return names.fields.has(r) || names.props.has(r) || names.nodes.has(r) ? r : undefined;
    }
    switch (r.ref) {
        case "field":  return names.fields.has(r.name) ? r.name : undefined;
        case "result": return names.nodes.has(r.name)  ? r.name : undefined;
        case "prop":   return names.props.has(r.name)  ? r.name : undefined;
    }
}
