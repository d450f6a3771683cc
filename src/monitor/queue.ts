/**
 * Event Queue
 *
 * Unbounded FIFO with a single consumer awaiting next(). Closing wakes the
 * consumer with undefined and discards anything still queued.
 */

export interface QueueInstance<T> {
    push(item: T): boolean;
    next(): Promise<T | undefined>;
    close(): void;
    size(): number;
    isClosed(): boolean;
}

export const create = <T>(): QueueInstance<T> => {
    const items: T[] = [];
    const waiters: Array<(item: T | undefined) => void> = [];
    let closed = false;

    const push = (item: T): boolean => {
        if (closed) return false;

        const waiter = waiters.shift();
        if (waiter) {
            waiter(item);
        } else {
            items.push(item);
        }
        return true;
    };

    const next = (): Promise<T | undefined> => {
        if (items.length > 0) {
            return Promise.resolve(items.shift());
        }
        if (closed) {
            return Promise.resolve(undefined);
        }
        return new Promise(resolve => waiters.push(resolve));
    };

    const close = (): void => {
        closed = true;
        items.length = 0;
        for (const waiter of waiters.splice(0)) {
            waiter(undefined);
        }
    };

    return {
        push,
        next,
        close,
        size: () => items.length,
        isClosed: () => closed,
    };
};
