/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import './promise-resolvers.js';
import type { Deferred } from './promise-resolvers.js';

/**
 * Unbounded FIFO queue between any number of producers and a single consumer.
 *
 * Producers push without ever waiting. The consumer awaits pop(), which
 * resolves as soon as an item is available. Items from one producer keep the
 * order they were pushed in. Items must not be undefined.
 */
export class MessageBus<T> {

    private readonly items: T[] = [];
    private waiter: Deferred<T> | undefined;

    // Abstraction function:
    //   AF(items, waiter) = the queue items[0], items[1], ..., oldest first,
    //     with a consumer waiting for the next item iff waiter is defined
    // Representation invariant:
    //   items is empty whenever waiter is defined
    // Safety from rep exposure:
    //   items and waiter are private; pop() hands out waiter.promise,
    //   which the consumer can only await

    private checkRep(): void {
        assert(this.waiter === undefined || this.items.length === 0);
    }

    /**
     * Append an item, and hand it to the consumer if it is waiting.
     *
     * @param item item to queue
     */
    public push(item: T): void {
        const waiter = this.waiter;
        if (waiter !== undefined) {
            this.waiter = undefined;
            waiter.resolve(item);
        } else {
            this.items.push(item);
        }
        this.checkRep();
    }

    /**
     * Take the oldest item, waiting for one if the queue is empty.
     * Requires that no other pop() is still waiting.
     *
     * @returns (a promise for) the oldest item, removed from the queue
     */
    public pop(): Promise<T> {
        assert(this.waiter === undefined, 'a bus has a single consumer');
        const item = this.items.shift();
        if (item !== undefined) {
            return Promise.resolve(item);
        }
        this.waiter = Promise.withResolvers<T>();
        this.checkRep();
        return this.waiter.promise;
    }

    /**
     * Drop every queued item. A consumer waiting in pop() keeps waiting.
     */
    public reset(): void {
        this.items.length = 0;
        this.checkRep();
    }

    /** Number of queued items. */
    public get size(): number {
        return this.items.length;
    }
}
