/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

// Promise.withResolvers for Node.js releases that lack it.
// Importing this module installs it on the global Promise object.

/** A promise together with the functions that settle it. */
export interface Deferred<T> {
    readonly promise: Promise<T>;
    readonly resolve: (value: T) => void;
    readonly reject: (reason?: unknown) => void;
}

declare global {
    interface PromiseConstructor {
        withResolvers<T>(): Deferred<T>;
    }
}

if (typeof Promise.withResolvers !== 'function') {
    Promise.withResolvers = function withResolvers<T>(): Deferred<T> {
        let resolve: (value: T) => void = () => {};
        let reject: (reason?: unknown) => void = () => {};
        const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
        return { promise, resolve, reject };
    };
}
