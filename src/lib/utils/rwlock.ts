/**
 * Promise-based reader/writer lock.
 *
 * Readers share, writers are exclusive. Waiters are served in arrival order:
 * a reader that shows up behind a queued writer waits for that writer, so a
 * stream of paste reads cannot starve a login.
 */

interface Waiter {
	exclusive: boolean;
	grant: () => void;
}

export class RwLock {
	private readers = 0;
	private writer = false;
	private readonly queue: Waiter[] = [];

	/** Run `fn` holding the shared side. */
	async read<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire(false);
		try {
			return await fn();
		} finally {
			this.release(false);
		}
	}

	/** Run `fn` holding the exclusive side. */
	async write<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire(true);
		try {
			return await fn();
		} finally {
			this.release(true);
		}
	}

	get activeReaders(): number {
		return this.readers;
	}

	get isWriteLocked(): boolean {
		return this.writer;
	}

	private acquire(exclusive: boolean): Promise<void> {
		if (this.queue.length === 0 && this.canGrant(exclusive)) {
			this.take(exclusive);
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.queue.push({
				exclusive,
				grant: () => {
					this.take(exclusive);
					resolve();
				}
			});
		});
	}

	private release(exclusive: boolean): void {
		if (exclusive) {
			this.writer = false;
		} else {
			this.readers--;
		}
		this.drain();
	}

	private drain(): void {
		for (;;) {
			const next = this.queue[0];
			if (!next || !this.canGrant(next.exclusive)) return;
			this.queue.shift();
			next.grant();
		}
	}

	private canGrant(exclusive: boolean): boolean {
		return exclusive ? !this.writer && this.readers === 0 : !this.writer;
	}

	private take(exclusive: boolean): void {
		if (exclusive) {
			this.writer = true;
		} else {
			this.readers++;
		}
	}
}
