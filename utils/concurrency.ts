/**
 * Maps items through an async function with at most `limit` calls in flight.
 * The output keeps the input order whatever order the calls finish in.
 */
export async function mapInOrder<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
    limit = 1,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async () => {
        while (next < items.length) {
            const index = next++;
            results[index] = await fn(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
    await Promise.all(workers);
    return results;
}
