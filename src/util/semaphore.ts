/**
 * Counting semaphore for bounding concurrent calls into a shared service.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.permits = permits;
    }

    async acquire(): Promise<() => void> {
        return new Promise((resolve) => {
            if (this.permits > 0) {
                this.permits--;
                resolve(() => this.release());
            } else {
                this.waiting.push(() => {
                    this.permits--;
                    resolve(() => this.release());
                });
            }
        });
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }

    private release(): void {
        this.permits++;
        const next = this.waiting.shift();
        if (next) next();
    }
}

/**
 * Runs `worker` over every item with at most `limit` in flight.
 * Results land in the slot of their input, whatever order they settle in.
 */
export const mapBounded = async <T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const semaphore = new Semaphore(limit);
    return Promise.all(items.map((item, index) => semaphore.run(() => worker(item, index))));
};
