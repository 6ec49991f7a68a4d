/**
 * Serialises async tasks that share a key; tasks under different keys run freely.
 *
 * Each key keeps the tail of its queue. A task starts once the previous tail
 * settles, whatever its outcome, and the key is forgotten when the queue drains.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(key, tail);

        try {
            return await result;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    get size(): number {
        return this.tails.size;
    }
}
