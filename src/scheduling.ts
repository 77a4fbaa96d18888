import { defer } from "./defer.ts";

/** Inbox state flags */
const enum Is {
    Unset = 0,
    _ = 1,
    Running   = _ << 0,
    Scheduled = _ << 1,
}

/**
 * A first-in, first-out message queue processed one message at a time.
 * Messages posted while a message is being handled wait for it to finish, so
 * handling is never re-entrant.
 *
 * @template T The type of messages that will be posted
 *
 * @category Scheduling
 */
export interface Inbox<T> {
    /** Is a message currently being handled? */
    isRunning(): boolean;

    /** Is the inbox currently empty? */
    isEmpty(): boolean;

    /**
     * Add a message to the inbox.  Schedules the inbox for processing if it
     * was empty and is not already scheduled or running.
     */
    post(msg: T): void;

    /**
     * Handle all pending messages now, unless the inbox is empty or already
     * running.  If a handler throws, the rest of the messages are left for
     * another flush via the inbox's scheduler.
     */
    readonly flush: () => void;
}

/**
 * Create an inbox from a message handler and a scheduling function.
 *
 * @param handle Called once for each message, in the order they were posted.
 *
 * @param sched A single-argument scheduling function (like setImmediate or
 * queueMicrotask), called with a callback that should be invoked *once* at
 * some later point, to process pending messages.  If no function is given,
 * {@link defer} is used.
 *
 * @category Scheduling
 */
export function inbox<T>(handle: (msg: T) => void, sched?: (cb: () => unknown) => unknown): Inbox<T> {
    return new _Inbox(handle, sched);
}

class _Inbox<T> implements Inbox<T> {
    protected _flags: Is = Is.Unset;
    protected readonly q: T[] = [];

    constructor(
        protected readonly handle: (msg: T) => void,
        protected readonly sched: ((cb: () => unknown) => unknown) | undefined | null,
    ) {}

    isRunning() { return !!(this._flags & Is.Running); }

    isEmpty() { return !this.q.length; }

    post(msg: T) {
        this.q.length || this._flags & (Is.Running|Is.Scheduled) || this._sched();
        this.q.push(msg);
    }

    protected _sched() {
        this._flags |= Is.Scheduled;
        (this.sched || defer)(this._run);
    }

    protected _run = () => {
        this._flags &= ~Is.Scheduled;
        this.flush();
    }

    flush = () => {
        // already running? the running loop will get to the new messages
        if (this._flags & Is.Running) return;
        const {q} = this;
        if (!q.length) return;
        this._flags |= Is.Running;
        try {
            while (q.length) {
                // remove before handling, so a failing message isn't retried forever
                const [msg] = q.splice(0, 1);
                this.handle(msg);
            }
        } finally {
            this._flags &= ~Is.Running;
            !q.length || (this._flags & Is.Scheduled) || this._sched();
        }
    }
}
