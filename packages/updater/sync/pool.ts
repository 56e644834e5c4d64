/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`. The worker must not throw; wrap it at
 * the call site if it can.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results: R[] = new Array(items.length)
	const queue = items.map((item, index) => ({ index, item }))
	const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length))

	async function runWorker(): Promise<void> {
		for (let task = queue.shift(); task; task = queue.shift()) {
			results[task.index] = await worker(task.item, task.index)
		}
	}

	await Promise.all(Array.from({ length: workerCount }, () => runWorker()))
	return results
}
