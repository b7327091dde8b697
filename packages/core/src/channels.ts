/**
 * In-process message channels.
 *
 * - {@link AsyncQueue}: a single-consumer queue with an optional bound.
 *   When bounded, a push onto a full queue evicts the oldest item.
 * - {@link Broadcaster}: fan-out to every subscriber, each holding its
 *   own bounded queue. Publishers never wait on slow subscribers; a
 *   subscriber that falls behind loses its oldest unread events.
 */

// ─── AsyncQueue ─────────────────────────────────────────────────────────────

export class AsyncQueue<T> implements AsyncIterable<T> {
	private readonly items: T[] = [];
	private readonly capacity: number;
	private waiter: ((item: T | undefined) => void) | null = null;
	private closed = false;
	private droppedCount = 0;

	/** @param capacity - Maximum buffered items. Defaults to unbounded. */
	constructor(capacity = Number.POSITIVE_INFINITY) {
		this.capacity = capacity;
	}

	/** Items buffered and not yet consumed. */
	get size(): number {
		return this.items.length;
	}

	/** Items evicted because the queue was full. */
	get dropped(): number {
		return this.droppedCount;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Enqueue an item.
	 *
	 * @returns false if the queue is closed.
	 */
	push(item: T): boolean {
		if (this.closed) return false;
		if (this.waiter) {
			const resolve = this.waiter;
			this.waiter = null;
			resolve(item);
			return true;
		}
		this.items.push(item);
		if (this.items.length > this.capacity) {
			this.items.shift();
			this.droppedCount++;
		}
		return true;
	}

	/** Wait for the next item. Resolves undefined once closed and drained. */
	next(): Promise<T | undefined> {
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift());
		}
		if (this.closed) return Promise.resolve(undefined);
		return new Promise((resolve) => {
			this.waiter = resolve;
		});
	}

	/** Stop accepting items. Buffered items are still delivered. */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		if (this.waiter) {
			const resolve = this.waiter;
			this.waiter = null;
			resolve(undefined);
		}
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		while (true) {
			const item = await this.next();
			if (item === undefined) return;
			yield item;
		}
	}
}

// ─── Broadcaster ────────────────────────────────────────────────────────────

export interface Subscription<T> extends AsyncIterable<T> {
	/** Wait for the next event. Resolves undefined once unsubscribed. */
	next(): Promise<T | undefined>;
	/** Events lost because this subscriber fell behind. */
	readonly dropped: number;
	unsubscribe(): void;
}

/** Default per-subscriber backlog. */
export const DEFAULT_BROADCAST_CAPACITY = 100;

export class Broadcaster<T> {
	private readonly subscribers = new Set<AsyncQueue<T>>();
	private readonly capacity: number;

	constructor(capacity = DEFAULT_BROADCAST_CAPACITY) {
		this.capacity = capacity;
	}

	get subscriberCount(): number {
		return this.subscribers.size;
	}

	/**
	 * Deliver a copy of `event` to every current subscriber.
	 *
	 * @returns the number of subscribers it was queued for.
	 */
	publish(event: T): number {
		for (const queue of this.subscribers) {
			queue.push(event);
		}
		return this.subscribers.size;
	}

	subscribe(): Subscription<T> {
		const queue = new AsyncQueue<T>(this.capacity);
		this.subscribers.add(queue);
		const unsubscribe = () => {
			this.subscribers.delete(queue);
			queue.close();
		};
		return {
			next: () => queue.next(),
			get dropped() {
				return queue.dropped;
			},
			unsubscribe,
			[Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
		};
	}

	/** Unsubscribe everyone. */
	close(): void {
		for (const queue of this.subscribers) {
			queue.close();
		}
		this.subscribers.clear();
	}
}
