// ---------------------------------------------------------------------------
// Bounded-concurrency map
// ---------------------------------------------------------------------------

/**
 * Map `items` through an async function with at most `limit` calls in
 * flight. Results keep the input order. Rejects with the first failure,
 * after which no new calls are started.
 */
export async function mapLimit<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results = new Array<R>(items.length);
	const requested = Number.isFinite(limit) ? Math.floor(limit) : 1;
	const workerCount = Math.max(1, Math.min(requested, items.length));
	let next = 0;
	let failed = false;

	const worker = async (): Promise<void> => {
		while (!failed && next < items.length) {
			const index = next++;
			try {
				results[index] = await fn(items[index], index);
			} catch (error) {
				failed = true;
				throw error;
			}
		}
	};

	const workers: Promise<void>[] = [];
	for (let i = 0; i < workerCount; i++) {
		workers.push(worker());
	}
	await Promise.all(workers);
	return results;
}
