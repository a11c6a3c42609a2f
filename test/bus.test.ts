/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { MessageBus } from '../src/bus.js';

/**
 * Tests for the message bus.
 */
describe('MessageBus', function() {

    // Testing strategy
    //   pop(): queue non-empty, queue empty then push, second waiting consumer
    //   push(): from several concurrent producers
    //   reset(): with queued items, with a waiting consumer

    this.timeout(5000);

    it('hands out items oldest first', async function() {
        const bus = new MessageBus<string>();
        bus.push('a');
        bus.push('b');
        assert.strictEqual(bus.size, 2);
        assert.strictEqual(await bus.pop(), 'a');
        assert.strictEqual(await bus.pop(), 'b');
        assert.strictEqual(bus.size, 0);
    });

    it('wakes a waiting consumer', async function() {
        const bus = new MessageBus<string>();
        const popped = bus.pop();
        bus.push('late');
        assert.strictEqual(await popped, 'late');
        assert.strictEqual(bus.size, 0);
    });

    it('keeps the order of 100 messages from a concurrent producer', async function() {
        const bus = new MessageBus<number>();
        const producer = (async () => {
            for (let ii = 0; ii < 100; ++ii) {
                bus.push(ii);
                if (ii % 7 === 0) {
                    await new Promise<void>(resolve => setTimeout(resolve, 1));
                }
            }
        })();
        const received: number[] = [];
        for (let ii = 0; ii < 100; ++ii) {
            received.push(await bus.pop());
        }
        await producer;
        assert.deepStrictEqual(received, Array.from({ length: 100 }, (_, ii) => ii));
    });

    it('keeps the order of each producer', async function() {
        const bus = new MessageBus<string>();
        const producers = [ 'x', 'y', 'z' ].map(async name => {
            for (let ii = 0; ii < 10; ++ii) {
                await new Promise<void>(resolve => setTimeout(resolve, Math.random() * 3));
                bus.push(`${name}${ii}`);
            }
        });
        const received: string[] = [];
        for (let ii = 0; ii < 30; ++ii) {
            received.push(await bus.pop());
        }
        await Promise.all(producers);
        for (const name of [ 'x', 'y', 'z' ]) {
            assert.deepStrictEqual(received.filter(item => item.startsWith(name)), Array.from({ length: 10 }, (_, ii) => `${name}${ii}`));
        }
    });

    it('has a single consumer', function() {
        const bus = new MessageBus<string>();
        const waiting = bus.pop();
        assert.throws(() => bus.pop(), /single consumer/);
        bus.push('done');
        return waiting.then(item => assert.strictEqual(item, 'done'));
    });

    it('drops queued items on reset', async function() {
        const bus = new MessageBus<string>();
        bus.push('a');
        bus.push('b');
        bus.reset();
        assert.strictEqual(bus.size, 0);
        const popped = bus.pop();
        bus.reset();
        bus.push('c');
        assert.strictEqual(await popped, 'c');
    });
});
