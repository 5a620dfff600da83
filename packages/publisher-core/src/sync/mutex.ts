/**
 * Mutex - single-permit async lock with FIFO hand-off.
 *
 * Guards one endpoint's buffer and connection. Critical sections may await
 * network I/O (connect, reconnect, publish); callers queue behind them in
 * arrival order, which is the endpoint's backpressure point.
 *
 * A released permit is handed directly to the next waiter, so a caller that
 * arrives between release() and the waiter resuming cannot jump the queue.
 */
export class Mutex {
	private locked = false;
	private readonly waiting: Array<() => void> = [];

	/**
	 * Whether a caller currently holds the lock.
	 */
	get isLocked(): boolean {
		return this.locked;
	}

	/**
	 * Number of callers waiting for the lock.
	 */
	get pendingCount(): number {
		return this.waiting.length;
	}

	/**
	 * Acquire the lock. Resolves immediately if it is free,
	 * otherwise queues until released.
	 */
	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}
		return new Promise<void>((resolve) => {
			this.waiting.push(resolve);
		});
	}

	/**
	 * Release the lock and hand it to the next waiter, if any.
	 */
	release(): void {
		if (!this.locked) {
			throw new Error('Mutex released while not locked');
		}

		const next = this.waiting.shift();
		if (next) {
			next();
			return;
		}
		this.locked = false;
	}

	/**
	 * Execute a function while holding the lock, releasing on completion.
	 */
	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
