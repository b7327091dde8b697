/**
 * Async read/write lock.
 *
 * Many concurrent readers or one writer. Waiters are granted strictly in
 * FIFO order: once a writer is queued, later readers queue behind it, so
 * a stream of readers cannot starve a writer.
 */

type Mode = "read" | "write";

interface Waiter {
	mode: Mode;
	grant: () => void;
}

/** Releases a held lock. Calling it more than once is a no-op. */
export type Release = () => void;

export class RwLock {
	private readers = 0;
	private writing = false;
	private readonly waiters: Waiter[] = [];

	/** Number of readers currently holding the lock. */
	get activeReaders(): number {
		return this.readers;
	}

	/** Whether a writer currently holds the lock. */
	get isWriteLocked(): boolean {
		return this.writing;
	}

	/** Number of callers waiting for the lock. */
	get queueLength(): number {
		return this.waiters.length;
	}

	acquireRead(): Promise<Release> {
		if (!this.writing && this.waiters.length === 0) {
			this.readers++;
			return Promise.resolve(this.releaser("read"));
		}
		return this.enqueue("read");
	}

	acquireWrite(): Promise<Release> {
		if (!this.writing && this.readers === 0 && this.waiters.length === 0) {
			this.writing = true;
			return Promise.resolve(this.releaser("write"));
		}
		return this.enqueue("write");
	}

	/** Run `fn` holding a shared lock. */
	async read<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquireRead();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	/** Run `fn` holding the exclusive lock. */
	async write<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquireWrite();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private enqueue(mode: Mode): Promise<Release> {
		return new Promise<Release>((resolve) => {
			this.waiters.push({ mode, grant: () => resolve(this.releaser(mode)) });
		});
	}

	private releaser(mode: Mode): Release {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			if (mode === "write") {
				this.writing = false;
			} else {
				this.readers--;
			}
			this.drain();
		};
	}

	private drain(): void {
		while (this.waiters.length > 0) {
			const next = this.waiters[0];
			if (next.mode === "write") {
				if (this.writing || this.readers > 0) return;
				this.waiters.shift();
				this.writing = true;
				next.grant();
				return;
			}
			if (this.writing) return;
			this.waiters.shift();
			this.readers++;
			next.grant();
		}
	}
}
