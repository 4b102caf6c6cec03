/**
 * Async Channel
 *
 * Unbounded FIFO between socket callbacks (producers) and the stream receive
 * loop (single consumer). Producers never block; the consumer awaits `take()`.
 */

export type TakeResult<T> =
	| { kind: "item"; value: T }
	| { kind: "aborted" }
	| { kind: "timeout" }
	| { kind: "closed" };

type Waiter<T> = (result: TakeResult<T>) => void;

export class AsyncChannel<T> {
	private readonly items: Array<{ value: T }> = [];
	private waiter: Waiter<T> | null = null;
	private closed = false;

	/**
	 * Enqueue an item. Ignored once the channel is closed.
	 */
	push(value: T): void {
		if (this.closed) {
			return;
		}
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter({ kind: "item", value });
			return;
		}
		this.items.push({ value });
	}

	/**
	 * Close the channel. Items already queued are still delivered; after that
	 * `take()` reports `closed`.
	 */
	close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter({ kind: "closed" });
		}
	}

	isClosed(): boolean {
		return this.closed;
	}

	get size(): number {
		return this.items.length;
	}

	/**
	 * Wait for the next item. An already-aborted signal wins over queued items.
	 */
	take(signal?: AbortSignal, timeoutMs?: number): Promise<TakeResult<T>> {
		if (signal?.aborted) {
			return Promise.resolve({ kind: "aborted" });
		}

		const next = this.items.shift();
		if (next) {
			return Promise.resolve({ kind: "item", value: next.value });
		}
		if (this.closed) {
			return Promise.resolve({ kind: "closed" });
		}
		if (this.waiter) {
			return Promise.reject(new Error("AsyncChannel supports a single consumer"));
		}

		return new Promise<TakeResult<T>>((resolve) => {
			let timer: ReturnType<typeof setTimeout> | undefined;

			const settle = (result: TakeResult<T>): void => {
				if (timer !== undefined) {
					clearTimeout(timer);
				}
				signal?.removeEventListener("abort", onAbort);
				resolve(result);
			};

			const onAbort = (): void => {
				if (this.waiter === settle) {
					this.waiter = null;
				}
				settle({ kind: "aborted" });
			};

			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					if (this.waiter === settle) {
						this.waiter = null;
					}
					settle({ kind: "timeout" });
				}, timeoutMs);
			}

			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiter = settle;
		});
	}
}
