/**
 * FIFO mutual exclusion for async critical sections.
 *
 * Each call to `runExclusive` waits for every previously queued task to
 * settle before starting, whether it resolved or rejected. The lock is held
 * only while the task runs; a rejection propagates to its own caller and
 * never blocks later tasks.
 *
 * @example
 * const lock = new SerialLock();
 * await lock.runExclusive(async () => {
 *     validate();
 *     await store.save(records);
 *     apply(records);
 * });
 */
export class SerialLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    /**
     * Number of tasks queued or running.
     */
    get size(): number {
        return this.pending;
    }

    async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>(resolve => {
            release = resolve;
        });
        this.pending++;

        try {
            await previous;
            return await task();
        } finally {
            this.pending--;
            release();
        }
    }
}
