import pMap from 'p-map';

/**
 * Map over items with at most `concurrency` calls in flight. Results come
 * back in input order no matter which call finishes first.
 */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    return pMap(items, fn, { concurrency: Math.max(1, Math.floor(concurrency)) });
};

/** Counting semaphore shared by callers that must respect one limit together. */
export class Semaphore {
    private readonly waiting: (() => void)[] = [];
    private available: number;

    constructor(readonly max: number) {
        this.available = Math.max(1, Math.floor(max));
    }

    async acquire(): Promise<void> {
        if (this.available > 0) {
            this.available--;
            return;
        }
        return new Promise<void>(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.available++;
        }
    }

    async use<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}
