import { describe, expect, test } from 'vitest';
import { Semaphore, mapWithConcurrency } from '../../src/util/concurrency';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
    test('should return results in input order when later calls finish first', async () => {
        const finished: number[] = [];

        const results = await mapWithConcurrency([30, 20, 10, 0], 4, async (ms, index) => {
            await delay(ms);
            finished.push(index);
            return `chunk-${index}`;
        });

        expect(results).toEqual(['chunk-0', 'chunk-1', 'chunk-2', 'chunk-3']);
        expect(finished).toEqual([3, 2, 1, 0]);
    });

    test('should keep at most the given number of calls in flight', async () => {
        let inFlight = 0;
        let peak = 0;

        await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(5);
            inFlight--;
        });

        expect(peak).toBe(2);
    });

    test('should treat a concurrency below one as sequential', async () => {
        let peak = 0;
        let inFlight = 0;

        await mapWithConcurrency(['a', 'b', 'c'], 0, async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(1);
            inFlight--;
        });

        expect(peak).toBe(1);
    });

    test('should reject when any call fails', async () => {
        await expect(mapWithConcurrency([1, 2], 2, async item => {
            if (item === 2) {
                throw new Error('chunk 2 failed');
            }
            return item;
        })).rejects.toThrow('chunk 2 failed');
    });
});

describe('Semaphore', () => {
    test('should hold separate callers to one shared limit', async () => {
        const semaphore = new Semaphore(2);
        let inFlight = 0;
        let peak = 0;
        const task = () => semaphore.use(async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(5);
            inFlight--;
        });

        await Promise.all([
            mapWithConcurrency([1, 2, 3], 2, task),
            mapWithConcurrency([4, 5, 6], 2, task),
        ]);

        expect(peak).toBe(2);
    });

    test('should release its slot when the call fails', async () => {
        const semaphore = new Semaphore(1);

        await expect(semaphore.use(async () => {
            throw new Error('rate limited');
        })).rejects.toThrow('rate limited');

        await expect(semaphore.use(async () => 'next')).resolves.toBe('next');
    });
});
