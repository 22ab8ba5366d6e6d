export type PoolOutcome<T, R> =
	| { status: "fulfilled"; item: T; value: R }
	| { status: "rejected"; item: T; error: unknown }
	| { status: "cancelled"; item: T };

export interface WorkerPoolOptions {
	signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Workers pull
 * from a shared cursor; once `signal` aborts nothing new is started and the
 * remaining items come back as cancelled. Outcomes keep input order.
 */
export async function runWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number) => Promise<R>,
	options: WorkerPoolOptions = {}
): Promise<Array<PoolOutcome<T, R>>> {
	if (!Number.isInteger(limit) || limit < 1) {
		throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
	}

	const outcomes: Array<PoolOutcome<T, R>> = items.map((item) => ({
		status: "cancelled",
		item,
	}));
	let cursor = 0;

	const next = async (): Promise<void> => {
		while (cursor < items.length) {
			if (options.signal?.aborted) {
				return;
			}
			const index = cursor;
			cursor += 1;
			const item = items[index];
			try {
				const value = await worker(item, index);
				outcomes[index] = { status: "fulfilled", item, value };
			} catch (error) {
				outcomes[index] = { status: "rejected", item, error };
			}
		}
	};

	const workerCount = Math.min(limit, items.length);
	await Promise.all(Array.from({ length: workerCount }, () => next()));
	return outcomes;
}
