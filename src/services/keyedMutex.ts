/**
 * Serializes async work per key. Work queued under the same key runs one
 * at a time in arrival order; different keys proceed independently.
 */
export class KeyedMutex<K> {
    private tails: Map<K, Promise<void>> = new Map();

    public async runExclusive<T>(key: K, work: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = () => resolve();
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await work();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    public isLocked(key: K): boolean {
        return this.tails.has(key);
    }
}
