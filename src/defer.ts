/**
 * Invoke a no-argument function as a microtask, using queueMicrotask or
 * Promise.resolve().then().  Owners' inboxes use this unless given another
 * scheduling function.
 *
 * @category Scheduling
 */
export const defer: (cb: () => unknown) => void =
    typeof queueMicrotask === "function" ?
        queueMicrotask :
        (p => (cb: () => unknown) => { p.then(cb); })(Promise.resolve());
