/**
 * Runs async tasks strictly one after another, in arrival order.
 *
 * A failed task does not stall the queue; its error only reaches the caller
 * that enqueued it.
 */
export class TaskQueue {
    private tail: Promise<void> = Promise.resolve();
    private waiting = 0;

    run<T>(task: () => Promise<T>): Promise<T> {
        this.waiting++;
        const result = this.tail.then(() => {
            this.waiting--;
            return task();
        });

        // Errors reach the caller through `result`
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    /** Tasks enqueued but not yet started */
    get pending(): number {
        return this.waiting;
    }

    /** Resolves once everything enqueued so far has settled */
    drain(): Promise<void> {
        return this.tail;
    }
}
