/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * Results are stored by input index, so completion order does not matter.
 *
 * On the first rejection no further items are started; tasks already running
 * are awaited and the first error is rethrown.
 */
export async function mapBounded<T, R>(
    items: readonly T[],
    concurrency: number,
    task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const results = new Array<R>(items.length);
    let next = 0;
    let failed = false;
    let firstError: unknown;

    const worker = async (): Promise<void> => {
        while (!failed && next < items.length) {
            const index = next++;
            try {
                results[index] = await task(items[index], index);
            } catch (err) {
                if (!failed) {
                    failed = true;
                    firstError = err;
                }
            }
        }
    };

    const workers = Math.min(concurrency, items.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (failed) throw firstError;
    return results;
}
