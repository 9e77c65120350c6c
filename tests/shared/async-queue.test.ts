/**
 * AsyncQueue Unit Tests
 */

import { AsyncQueue } from '../../src/shared/async-queue';

async function drain<T>(queue: AsyncQueue<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of queue) {
        items.push(item);
    }
    return items;
}

describe('AsyncQueue', () => {
    it('should reject a non-positive capacity', () => {
        expect(() => new AsyncQueue<number>(0)).toThrow(RangeError);
    });

    it('should deliver items in FIFO order and refuse pushes when full', () => {
        const queue = new AsyncQueue<number>(2);
        expect(queue.push(1)).toBe(true);
        expect(queue.push(2)).toBe(true);
        expect(queue.push(3)).toBe(false);
        expect(queue.size).toBe(2);
    });

    it('should hand an item straight to a waiting reader', async () => {
        const queue = new AsyncQueue<string>(1);
        const pending = queue.shift();
        queue.push('a');
        await expect(pending).resolves.toEqual({ value: 'a', done: false });
        expect(queue.size).toBe(0);
    });

    describe('pushDropOldest', () => {
        it('should evict the oldest item when full', async () => {
            const queue = new AsyncQueue<number>(2);
            queue.push(1);
            queue.push(2);

            expect(queue.pushDropOldest(3)).toEqual({ accepted: true, dropped: 1 });
            queue.close();
            await expect(drain(queue)).resolves.toEqual([2, 3]);
        });

        it('should only evict items the predicate allows', async () => {
            const queue = new AsyncQueue<number>(2);
            const isEven = (n: number) => n % 2 === 0;
            queue.push(1);
            queue.push(2);

            expect(queue.pushDropOldest(3, isEven)).toEqual({ accepted: true, dropped: 2 });
            expect(queue.pushDropOldest(5, isEven)).toEqual({ accepted: false, dropped: 5 });
            queue.close();
            await expect(drain(queue)).resolves.toEqual([1, 3]);
        });

        it('should accept without eviction while there is room', () => {
            const queue = new AsyncQueue<number>(2);
            expect(queue.pushDropOldest(1)).toEqual({ accepted: true, dropped: undefined });
        });
    });

    describe('offer', () => {
        it('should time out while the queue stays full', async () => {
            const queue = new AsyncQueue<string>(1);
            queue.push('a');
            await expect(queue.offer('b', 20)).resolves.toBe('timeout');
            expect(queue.size).toBe(1);
        });

        it('should complete once a reader makes room', async () => {
            const queue = new AsyncQueue<string>(1);
            queue.push('a');
            const pending = queue.offer('b', 1000);

            await expect(queue.shift()).resolves.toEqual({ value: 'a', done: false });
            await expect(pending).resolves.toBe('accepted');
            await expect(queue.shift()).resolves.toEqual({ value: 'b', done: false });
        });

        it('should stop waiting when the signal aborts', async () => {
            const queue = new AsyncQueue<string>(1);
            queue.push('a');
            const controller = new AbortController();
            const pending = queue.offer('b', Number.POSITIVE_INFINITY, controller.signal);
            controller.abort();
            await expect(pending).resolves.toBe('aborted');
        });

        it('should report closed after close()', async () => {
            const queue = new AsyncQueue<string>(1);
            queue.close();
            await expect(queue.offer('a')).resolves.toBe('closed');
        });
    });

    it('should drain queued items after close()', async () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.push(2);
        queue.close();

        expect(queue.push(3)).toBe(false);
        await expect(drain(queue)).resolves.toEqual([1, 2]);
    });

    it('should raise the failure after the buffer drains', async () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.fail(new Error('boom'));

        await expect(queue.shift()).resolves.toEqual({ value: 1, done: false });
        await expect(queue.shift()).rejects.toThrow('boom');
    });

    it('should reject a pending reader on fail()', async () => {
        const queue = new AsyncQueue<number>();
        const pending = queue.shift();
        queue.fail(new Error('closed by peer'));
        await expect(pending).rejects.toThrow('closed by peer');
    });

    it('should clear queued items', () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.push(2);
        expect(queue.clear()).toBe(2);
        expect(queue.size).toBe(0);
    });
});
