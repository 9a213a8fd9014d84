/**
 * @mimicode/model: FIFO request queue with concurrency control.
 *
 * Chat generation runs through a single-worker instance of this queue, which
 * makes the chat engine the only writer of the conversation history and keeps
 * every (user, assistant) pair adjacent no matter how callers overlap.
 */

import { AbortError, QueueError, toError } from "@mimicode/core";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RequestQueueConfig {
	/** Maximum concurrent requests. Defaults to 1. */
	concurrency: number;
}

export const DEFAULT_QUEUE_CONFIG: RequestQueueConfig = {
	concurrency: 1,
};

/** Statistics about the queue state. */
export interface QueueStats {
	pending: number;
	active: number;
	completed: number;
	failed: number;
	cancelled: number;
	total: number;
}

/** A handle returned when a request is enqueued. */
export interface RequestHandle<T> {
	id: string;
	promise: Promise<T>;
	/** Cancel this request. Returns false when it already settled. */
	cancel(): boolean;
}

type RequestStatus = "pending" | "active" | "completed" | "failed" | "cancelled";

interface QueuedItem {
	id: string;
	status: RequestStatus;
	abortController: AbortController;
	/** Run the request. Resolves to a callback that settles the caller's promise. */
	run(signal: AbortSignal): Promise<() => void>;
	/** Reject the caller's promise without running. */
	fail(error: Error): void;
}

// ─── Request Queue ──────────────────────────────────────────────────────────

/**
 * A first-in, first-out request queue.
 *
 * @example
 * ```ts
 * const queue = new RequestQueue();
 * const handle = queue.enqueue((signal) => generate(message, signal));
 * const reply = await handle.promise;
 * ```
 */
export class RequestQueue {
	private readonly config: RequestQueueConfig;
	private pending: QueuedItem[] = [];
	private readonly active = new Map<string, QueuedItem>();
	private idleWaiters: (() => void)[] = [];
	private completedCount = 0;
	private failedCount = 0;
	private cancelledCount = 0;
	private idCounter = 0;
	private destroyed = false;

	constructor(config: Partial<RequestQueueConfig> = {}) {
		this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };
		this.config.concurrency = Math.max(1, Math.floor(this.config.concurrency));
	}

	/**
	 * Enqueue a request. `execute` receives a signal that aborts when the
	 * request is cancelled or the queue destroyed.
	 *
	 * @throws {QueueError} If the queue has been destroyed.
	 */
	enqueue<T>(execute: (signal: AbortSignal) => Promise<T>): RequestHandle<T> {
		if (this.destroyed) {
			throw new QueueError("Request queue has been destroyed");
		}

		const id = `req_${++this.idCounter}`;
		const abortController = new AbortController();

		const promise = new Promise<T>((resolve, reject) => {
			const item: QueuedItem = {
				id,
				status: "pending",
				abortController,
				run: async (signal) => {
					const value = await execute(signal);
					return () => resolve(value);
				},
				fail: reject,
			};
			this.pending.push(item);
		});

		this.processQueue();

		return {
			id,
			promise,
			cancel: () => this.cancelRequest(id),
		};
	}

	/**
	 * Cancel a request by ID. Pending requests are removed and rejected with
	 * {@link AbortError}; active ones are aborted and settle through their
	 * own signal handling.
	 */
	cancelRequest(id: string): boolean {
		const pendingIdx = this.pending.findIndex((item) => item.id === id);
		if (pendingIdx !== -1) {
			const [item] = this.pending.splice(pendingIdx, 1);
			this.markCancelled(item, new AbortError("Request cancelled"));
			this.notifyIfIdle();
			return true;
		}

		const activeItem = this.active.get(id);
		if (activeItem) {
			activeItem.abortController.abort();
			return true;
		}

		return false;
	}

	/** Cancel every pending and active request. Returns how many were cancelled. */
	cancelAll(): number {
		const items = [...this.pending, ...this.active.values()];
		this.pending = [];
		this.active.clear();
		for (const item of items) {
			this.markCancelled(item, new AbortError("Request cancelled"));
		}
		this.notifyIfIdle();
		return items.length;
	}

	getStats(): QueueStats {
		return {
			pending: this.pending.length,
			active: this.active.size,
			completed: this.completedCount,
			failed: this.failedCount,
			cancelled: this.cancelledCount,
			total:
				this.pending.length +
				this.active.size +
				this.completedCount +
				this.failedCount +
				this.cancelledCount,
		};
	}

	isIdle(): boolean {
		return this.pending.length === 0 && this.active.size === 0;
	}

	/** Resolve once no request is pending or active. */
	drain(): Promise<void> {
		if (this.isIdle()) return Promise.resolve();
		return new Promise<void>((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/** Destroy the queue, cancelling all requests. Further enqueues throw. */
	destroy(): void {
		this.destroyed = true;
		this.cancelAll();
	}

	isDestroyed(): boolean {
		return this.destroyed;
	}

	// ─── Private ────────────────────────────────────────────────────────

	private markCancelled(item: QueuedItem, error: Error): void {
		item.status = "cancelled";
		item.abortController.abort();
		item.fail(error);
		this.cancelledCount++;
	}

	private notifyIfIdle(): void {
		if (!this.isIdle()) return;
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const resolve of waiters) resolve();
	}

	private processQueue(): void {
		while (this.active.size < this.config.concurrency && !this.destroyed) {
			const item = this.pending.shift();
			if (!item) break;
			this.processItem(item);
		}
	}

	private processItem(item: QueuedItem): void {
		item.status = "active";
		this.active.set(item.id, item);

		// Bookkeeping happens before the caller's promise settles, so a caller
		// awaiting the result already sees the request counted.
		item.run(item.abortController.signal)
			.then((settle) => {
				// cancelAll() already rejected it
				if (item.status === "cancelled") return;
				item.status = "completed";
				this.completedCount++;
				this.active.delete(item.id);
				settle();
			})
			.catch((error: unknown) => {
				if (item.status === "cancelled") return;
				if (item.abortController.signal.aborted) {
					item.status = "cancelled";
					this.cancelledCount++;
				} else {
					item.status = "failed";
					this.failedCount++;
				}
				this.active.delete(item.id);
				item.fail(toError(error));
			})
			.finally(() => {
				this.processQueue();
				this.notifyIfIdle();
			});
	}
}
