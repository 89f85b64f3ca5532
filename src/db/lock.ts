/**
 * In-process mutex. Tasks passed to `run` execute one at a time, in call order.
 * A failed task does not block the ones queued behind it.
 */
export class SerialLock {
    private tail: Promise<void> = Promise.resolve();

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
