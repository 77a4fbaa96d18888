/**
 * Base class for errors found while building a graph from declarations.
 * These are configuration errors: they're thrown by {@link build}(), never
 * stored as a node's state.
 *
 * @category Errors
 */
export class BuildError extends Error {
    constructor(message: string, readonly node: string) {
        super(message);
    }
}

/**
 * A declaration refers to a field, prop or node that doesn't exist (or isn't
 * of the kind the reference asks for).
 *
 * @category Errors
 */
export class UnresolvedReference extends BuildError {
    constructor(node: string, readonly ref: string) {
        super(`${node}: cannot resolve dependency ${ref}`, node);
    }
}

/**
 * Two nodes share a name, or a node is named like a field or prop.
 *
 * @category Errors
 */
export class DuplicateName extends BuildError {
    constructor(node: string) {
        super(`${node}: name is already declared`, node);
    }
}

/**
 * The nodes' dependencies form a cycle.  `cycle` lists the names along it,
 * starting and ending with the same node.
 *
 * @category Errors
 */
export class CircularDependency extends BuildError {
    constructor(readonly cycle: readonly string[]) {
        super(`Circular dependency: ${cycle.join(" -> ")}`, cycle[0] ?? "");
    }
}

/**
 * A required url field was missing from the URL params.
 *
 * @category Errors
 */
export class MissingField extends Error {
    constructor(readonly field: string) {
        super(`Required URL field ${field} not present`);
    }
}

/**
 * Thrown (or used as a rejection) by {@link ResourceAccess.fetchById} when no
 * record has the requested id.
 *
 * @category Errors
 */
export class NotFound extends Error {}
