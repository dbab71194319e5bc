/**
 * Async mutual exclusion
 */

type Release = () => void;

/**
 * FIFO async mutex. Callers queue in arrival order; `runExclusive` releases
 * the lock whether `fn` resolves or throws.
 *
 * Not reentrant: calling `runExclusive` from inside `fn` on the same mutex
 * never resolves.
 */
export class Mutex {
	private queue: Array<() => void> = [];
	private locked = false;

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	/**
	 * Whether a caller currently holds the lock.
	 */
	isLocked(): boolean {
		return this.locked;
	}

	private acquire(): Promise<Release> {
		return new Promise<Release>((resolve) => {
			const tryAcquire = () => {
				if (!this.locked) {
					this.locked = true;
					resolve(() => this.release());
				} else {
					this.queue.push(tryAcquire);
				}
			};
			tryAcquire();
		});
	}

	private release(): void {
		this.locked = false;
		const next = this.queue.shift();
		if (next) next();
	}
}
