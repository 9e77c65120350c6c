/**
 * Timing helper tests
 */

import { ExponentialBackoff, linkedController, sleep, withTimeout } from '../../src/shared/timing';

describe('sleep', () => {
    it('should resolve true after the delay', async () => {
        await expect(sleep(5)).resolves.toBe(true);
    });

    it('should resolve false when aborted', async () => {
        const controller = new AbortController();
        const pending = sleep(60_000, controller.signal);
        controller.abort();
        await expect(pending).resolves.toBe(false);
    });

    it('should resolve false immediately for an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(sleep(60_000, controller.signal)).resolves.toBe(false);
    });
});

describe('withTimeout', () => {
    it('should pass through a value that settles in time', async () => {
        await expect(withTimeout(Promise.resolve(42), 1000, () => new Error('late'))).resolves.toBe(42);
    });

    it('should reject with the timeout error', async () => {
        const never = new Promise<number>(() => undefined);
        await expect(withTimeout(never, 10, () => new Error('late'))).rejects.toThrow('late');
    });

    it('should pass through rejections', async () => {
        await expect(withTimeout(Promise.reject(new Error('failed')), 1000, () => new Error('late'))).rejects.toThrow(
            'failed'
        );
    });

    it('should return the promise itself for an infinite timeout', () => {
        const promise = Promise.resolve(1);
        expect(withTimeout(promise, Number.POSITIVE_INFINITY, () => new Error('late'))).toBe(promise);
    });
});

describe('ExponentialBackoff', () => {
    it('should double each attempt up to the cap', () => {
        const backoff = new ExponentialBackoff(100, 1000);
        const delays = [1, 2, 3, 4, 5, 6].map(() => backoff.next());
        expect(delays).toEqual([100, 200, 400, 800, 1000, 1000]);
    });

    it('should restart from the initial delay after reset', () => {
        const backoff = new ExponentialBackoff(100, 1000);
        backoff.next();
        backoff.next();
        backoff.reset();
        expect(backoff.next()).toBe(100);
    });
});

describe('linkedController', () => {
    it('should abort with its parent', () => {
        const parent = new AbortController();
        const { controller } = linkedController(parent.signal);
        parent.abort();
        expect(controller.signal.aborted).toBe(true);
    });

    it('should abort on its own without touching the parent', () => {
        const parent = new AbortController();
        const { controller } = linkedController(parent.signal);
        controller.abort();
        expect(controller.signal.aborted).toBe(true);
        expect(parent.signal.aborted).toBe(false);
    });

    it('should start aborted under an aborted parent', () => {
        const parent = new AbortController();
        parent.abort();
        expect(linkedController(parent.signal).controller.signal.aborted).toBe(true);
    });

    it('should stop following the parent once disposed', () => {
        const parent = new AbortController();
        const linked = linkedController(parent.signal);
        linked.dispose();
        parent.abort();
        expect(linked.controller.signal.aborted).toBe(false);
    });
});
