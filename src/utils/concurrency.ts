/**
 * Runs `task` over `items` with at most `limit` tasks in flight and resolves
 * with the results in input order. After the first rejection no new tasks
 * are started; the rejection is rethrown once the tasks already running have
 * settled, so nothing is left running when the caller moves on.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const failures: unknown[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length && failures.length === 0) {
            const index = next++;
            try {
                results[index] = await task(items[index], index);
            } catch (reason) {
                failures.push(reason);
            }
        }
    };

    const workerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (failures.length > 0) {
        throw failures[0];
    }
    return results;
}
