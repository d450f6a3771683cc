import { describe, it, expect } from 'vitest';
import * as Queue from '../../src/monitor/queue';

describe('Event Queue', () => {
    it('should return items in arrival order', async () => {
        const queue = Queue.create<string>();
        queue.push('a');
        queue.push('b');

        expect(queue.size()).toBe(2);
        expect(await queue.next()).toBe('a');
        expect(await queue.next()).toBe('b');
        expect(queue.size()).toBe(0);
    });

    it('should wake a waiting consumer', async () => {
        const queue = Queue.create<string>();
        const pending = queue.next();

        expect(queue.push('a')).toBe(true);
        expect(await pending).toBe('a');
        expect(queue.size()).toBe(0);
    });

    it('should discard queued items and wake waiters on close', async () => {
        const queue = Queue.create<string>();
        queue.push('a');
        queue.close();

        expect(queue.isClosed()).toBe(true);
        expect(queue.size()).toBe(0);
        expect(await queue.next()).toBeUndefined();

        const waiting = Queue.create<string>();
        const pending = waiting.next();
        waiting.close();
        expect(await pending).toBeUndefined();
    });

    it('should refuse items after close', () => {
        const queue = Queue.create<number>();
        queue.close();

        expect(queue.push(1)).toBe(false);
        expect(queue.size()).toBe(0);
    });
});
