import { type Logger, nullLogger } from "./logger.ts";
import type { FailedState, ReadyState } from "./states.ts";
import type { DisposeFn } from "./types.ts";

/**
 * Identifies an owner: a top-level view, or a component instance inside one.
 * A background task carries the address of the owner that spawned it, since
 * that's the only way its result can find its way back.
 *
 * @category Types and Interfaces
 */
export type OwnerAddress =
    | {readonly kind: "view", readonly id: string}
    | {readonly kind: "component", readonly view: string, readonly id: string}
;

/** @category Routing */
export function viewAddress(id: string): OwnerAddress { return {kind: "view", id}; }

/** @category Routing */
export function componentAddress(view: string, id: string): OwnerAddress { return {kind: "component", view, id}; }

/**
 * A string that's equal for equal addresses
 *
 * @category Routing
 */
export function addressKey(address: OwnerAddress) {
    return address.kind === "view" ? `view:${address.id}` : `component:${address.view}/${address.id}`;
}

/**
 * The outcome of an async node's background task
 *
 * @category Types and Interfaces
 */
export type TaskResult = ReadyState<unknown> | FailedState;

/**
 * The message a finished task sends to its owner.  `generation` is the
 * owner's pass number when the task was spawned, so the owner can tell a
 * result that's been superseded.
 *
 * @category Types and Interfaces
 */
export interface Delivery {
    readonly node: string;
    readonly result: TaskResult;
    readonly generation: number;
}

/**
 * Anything that can receive task results: usually an {@link Owner}.
 *
 * @category Types and Interfaces
 */
export interface Recipient {
    receive(delivery: Delivery): void;
}

/**
 * Routes background task results to the owner that spawned the task.
 *
 * Owners register under their address when mounted and unregister when they
 * end; results for an address with no owner are dropped.
 *
 * @category Routing
 */
export class Router {
    protected readonly owners = new Map<string, Recipient>();

    constructor(protected readonly logger: Logger = nullLogger) {}

    /**
     * Register a recipient for an address, replacing any previous one.
     *
     * @returns a function that unregisters it (if it's still the one
     * registered)
     */
    register(address: OwnerAddress, owner: Recipient): DisposeFn {
        const key = addressKey(address);
        if (this.owners.has(key)) this.logger.warn(`${key} registered twice; replacing`);
        this.owners.set(key, owner);
        return () => { if (this.owners.get(key) === owner) this.owners.delete(key); };
    }

    unregister(address: OwnerAddress) {
        this.owners.delete(addressKey(address));
    }

    /** Is an owner registered at the address? */
    has(address: OwnerAddress) {
        return this.owners.has(addressKey(address));
    }

    /**
     * Deliver a task result to the owner at `address`.
     *
     * @returns true if there was an owner to deliver it to
     */
    deliver(address: OwnerAddress, node: string, result: TaskResult, generation: number): boolean {
        const key = addressKey(address), owner = this.owners.get(key);
        if (!owner) {
            this.logger.warn(`dropping result for ${node}: no owner at ${key}`);
            return false;
        }
        owner.receive({node, result, generation});
        return true;
    }
}
