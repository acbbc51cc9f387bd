interface Waiter {
	resolve: () => void;
	reject: (reason: unknown) => void;
}

export class Semaphore {
	private active = 0;
	private readonly limit: number;
	private readonly queue: Waiter[] = [];

	constructor(limit: number) {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new Error(
				`Semaphore limit must be a positive integer, got ${limit}`,
			);
		}
		this.limit = limit;
	}

	async acquire(signal?: AbortSignal): Promise<void> {
		signal?.throwIfAborted();
		if (this.active < this.limit) {
			this.active++;
			return;
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = { resolve, reject };
			this.queue.push(waiter);

			signal?.addEventListener(
				"abort",
				() => {
					const idx = this.queue.indexOf(waiter);
					if (idx >= 0) {
						this.queue.splice(idx, 1);
						reject(signal.reason ?? new DOMException("Aborted", "AbortError"));
					}
					// If idx < 0, waiter was already resolved by release() - do nothing
				},
				{ once: true },
			);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next.resolve();
		} else {
			this.active--;
		}
	}

	async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		await this.acquire(signal);
		try {
			return await task();
		} finally {
			this.release();
		}
	}
}

/**
 * Maps `items` through `task` with at most `concurrency` calls in flight.
 * Results keep the order of `items` regardless of completion order. The
 * first rejection rejects the whole map and aborts the signal handed to
 * every task, so queued items never start. Aborting `signal` does the same.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	task: (item: T, index: number, signal: AbortSignal) => Promise<R>,
	signal?: AbortSignal,
): Promise<R[]> {
	const semaphore = new Semaphore(concurrency);
	const controller = new AbortController();
	const onAbort = () => controller.abort(signal?.reason);
	if (signal?.aborted) {
		onAbort();
	} else {
		signal?.addEventListener("abort", onAbort, { once: true });
	}

	try {
		return await Promise.all(
			items.map((item, index) =>
				semaphore.run(async () => {
					controller.signal.throwIfAborted();
					try {
						return await task(item, index, controller.signal);
					} catch (error) {
						// Abort before the slot is released so no waiter gets it.
						controller.abort(error);
						throw error;
					}
				}, controller.signal),
			),
		);
	} finally {
		signal?.removeEventListener("abort", onAbort);
	}
}
