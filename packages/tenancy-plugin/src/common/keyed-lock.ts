/**
 * Serialises async work per key within this process. Work queued under the
 * same key runs one at a time in arrival order; different keys run freely.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(work);
        // The tail only orders the queue; the caller receives the rejection through `result`.
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

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
