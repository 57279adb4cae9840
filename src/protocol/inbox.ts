import { TransportClosedError } from '../core/errors.js';

interface Waiter<T> {
    resolve: (item: T) => void;
    reject: (error: Error) => void;
}

/**
 * Hands items from stream callbacks to `receive()` callers in arrival order.
 * Items queued before `close()` are still handed out; after that every
 * pending and later `next()` rejects with `TransportClosedError`.
 */
export class Inbox<T> {
    readonly #items: Array<{ value: T }> = [];
    readonly #waiters: Waiter<T>[] = [];
    #closedReason: string | null = null;

    get closed(): boolean {
        return this.#closedReason !== null;
    }

    push(item: T): void {
        if (this.#closedReason !== null) return;
        const waiter = this.#waiters.shift();
        if (waiter) {
            waiter.resolve(item);
        } else {
            this.#items.push({ value: item });
        }
    }

    next(): Promise<T> {
        const queued = this.#items.shift();
        if (queued) {
            return Promise.resolve(queued.value);
        }
        if (this.#closedReason !== null) {
            return Promise.reject(new TransportClosedError(this.#closedReason));
        }
        return new Promise<T>((resolve, reject) => {
            this.#waiters.push({ resolve, reject });
        });
    }

    close(reason: string): void {
        if (this.#closedReason !== null) return;
        this.#closedReason = reason;
        for (const waiter of this.#waiters.splice(0)) {
            waiter.reject(new TransportClosedError(reason));
        }
    }
}
