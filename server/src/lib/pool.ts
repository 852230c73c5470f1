/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep input order; a rejection never stops the other items.
 */
export async function runPool<T, R>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
	const results: PromiseSettledResult<R>[] = new Array(items.length);
	const size = Math.max(1, Math.min(Math.floor(limit), items.length));
	let next = 0;

	async function lane(): Promise<void> {
		while (next < items.length) {
			const idx = next++;
			try {
				results[idx] = { status: "fulfilled", value: await worker(items[idx], idx) };
			} catch (reason) {
				results[idx] = { status: "rejected", reason };
			}
		}
	}

	const lanes: Promise<void>[] = [];
	for (let i = 0; i < size && i < items.length; i++) lanes.push(lane());
	await Promise.all(lanes);
	return results;
}
