export type ConcurrencyLimiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Bounds how many async tasks run at once. Waiters are served in FIFO order; a
 * finishing task hands its slot straight to the next waiter.
 * @param maxConcurrency - Slots available; values below 1 are treated as 1.
 * @returns A function that runs the given task once a slot is free.
 */
export function createConcurrencyLimiter(maxConcurrency: number): ConcurrencyLimiter {
	let freeSlots = Math.max(1, Math.floor(maxConcurrency));
	const waiters: Array<() => void> = [];

	const takeSlot = (): Promise<void> => {
		if (freeSlots > 0) {
			freeSlots--;
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => waiters.push(resolve));
	};

	const giveBack = (): void => {
		const next = waiters.shift();
		if (next) next();
		else freeSlots++;
	};

	return async <T>(fn: () => Promise<T>): Promise<T> => {
		await takeSlot();
		try {
			return await fn();
		} finally {
			giveBack();
		}
	};
}

/**
 * Maps items through an async function with bounded concurrency, keeping input order.
 */
export async function mapLimited<T, R>(
	items: ReadonlyArray<T>,
	runLimited: ConcurrencyLimiter,
	fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
	return await Promise.all(items.map((item, index) => runLimited(() => fn(item, index))));
}
