/**
 * Keyed mutual exclusion. Work submitted under the same key runs strictly
 * one after another in submission order; different keys never wait on each other.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    public async runExclusive<T>(key: string, work: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
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

    public isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
