/**
 * Single-consumer async queue bridging callback producers (child process
 * events) to `for await` consumers. Values are delivered in push order; the
 * consumer suspends while the queue is empty.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
    private readonly values: T[] = [];
    private waiter: ((result: IteratorResult<T>) => void) | null = null;
    private failWaiter: ((error: unknown) => void) | null = null;
    private closed = false;
    private error: { reason: unknown } | null = null;
    private iterating = false;

    /** Enqueues a value. Ignored once the channel is closed. */
    push(value: T): void {
        if (this.closed) return;
        if (this.waiter) {
            const resolve = this.waiter;
            this.clearWaiters();
            resolve({ value, done: false });
            return;
        }
        this.values.push(value);
    }

    /** Ends the stream after the already queued values. */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.waiter) {
            const resolve = this.waiter;
            this.clearWaiters();
            resolve({ value: undefined, done: true });
        }
    }

    /** Ends the stream with an error, raised after the already queued values. */
    fail(reason: unknown): void {
        if (this.closed) return;
        this.closed = true;
        this.error = { reason };
        if (this.failWaiter) {
            const reject = this.failWaiter;
            this.clearWaiters();
            reject(reason);
        }
    }

    private clearWaiters(): void {
        this.waiter = null;
        this.failWaiter = null;
    }

    private next(): Promise<IteratorResult<T>> {
        if (this.values.length > 0) {
            const [value] = this.values.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }
        if (this.error) {
            return Promise.reject(this.error.reason);
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve, reject) => {
            this.waiter = resolve;
            this.failWaiter = reject;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        if (this.iterating) {
            throw new Error('AsyncChannel supports a single consumer');
        }
        this.iterating = true;
        return {
            next: () => this.next(),
            return: async () => {
                this.values.length = 0;
                this.closed = true;
                return { value: undefined, done: true };
            },
        };
    }
}
