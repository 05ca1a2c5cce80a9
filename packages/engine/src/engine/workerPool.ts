/**
 * @fileoverview Bounded worker pool
 *
 * Runs an async task over a list of items with at most `concurrency`
 * tasks in flight. Every item is attempted; a failing item is reported to
 * `onError` and never stops the others.
 *
 * @module @scriptorium/engine/engine/workerPool
 */

export interface WorkerPoolOptions<TItem> {
    /** Maximum tasks in flight (clamped to at least 1) */
    readonly concurrency: number;

    /** Called when a task throws or rejects */
    readonly onError?: (item: TItem, error: unknown) => void;

    /** Called after every item, successful or not */
    readonly onProgress?: (done: number, total: number) => void;
}

/**
 * Run `task` for every item with bounded concurrency.
 *
 * @param items - Work items (not modified)
 * @param task - Async task per item
 * @param options - Concurrency and callbacks
 */
export async function runWithConcurrency<TItem>(
    items: readonly TItem[],
    task: (item: TItem) => Promise<void>,
    options: WorkerPoolOptions<TItem>
): Promise<void> {
    const queue = items.slice();
    const total = items.length;
    const workerCount = Math.max(1, Math.min(Math.floor(options.concurrency) || 1, queue.length));
    let done = 0;

    const workers = Array.from({ length: workerCount }, async () => {
        let item = queue.shift();
        while (item !== undefined) {
            try {
                await task(item);
            }
            catch (error) {
                options.onError?.(item, error);
            }
            finally {
                done += 1;
                options.onProgress?.(done, total);
            }
            item = queue.shift();
        }
    });

    await Promise.all(workers);
}
