import type { Bar } from "@barsim/core";
import { errorMessage, runtimeLogger } from "../runtimeShared";

export type BarWorker = (bar: Bar) => void | Promise<void>;

export const DEFAULT_QUEUE_CAPACITY = 64;

/**
 * Bounded FIFO drained by a single worker. `push` resolves once the bar is
 * admitted, waiting while the queue is full; it never waits for processing.
 * Bars are handled one at a time in arrival order.
 */
export class BarQueue {
	private readonly items: Bar[] = [];
	private readonly waiters: Array<() => void> = [];
	private readonly capacity: number;
	private draining: Promise<void> | null = null;
	private closed = false;

	constructor(
		private readonly worker: BarWorker,
		capacity = DEFAULT_QUEUE_CAPACITY
	) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`BarQueue capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	get size(): number {
		return this.items.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Resolves false when the queue closed before the bar was admitted. */
	async push(bar: Bar): Promise<boolean> {
		while (!this.closed && this.items.length >= this.capacity) {
			await new Promise<void>((resolve) => this.waiters.push(resolve));
		}
		if (this.closed) {
			return false;
		}
		this.items.push(bar);
		this.kick();
		return true;
	}

	/** Resolves once every admitted bar has been handled. */
	async idle(): Promise<void> {
		while (this.draining) {
			await this.draining;
		}
	}

	/**
	 * Stops admission, discards bars not yet started and waits for the bar in
	 * flight. Returns the number of discarded bars.
	 */
	async close(): Promise<number> {
		this.closed = true;
		const discarded = this.items.length;
		this.items.length = 0;
		this.releaseWaiters(this.waiters.length);
		await this.idle();
		return discarded;
	}

	private kick(): void {
		if (this.draining) {
			return;
		}
		this.draining = this.drain().finally(() => {
			this.draining = null;
			if (!this.closed && this.items.length) {
				this.kick();
			}
		});
	}

	private async drain(): Promise<void> {
		while (!this.closed) {
			const bar = this.items.shift();
			if (!bar) {
				return;
			}
			this.releaseWaiters(1);
			try {
				await this.worker(bar);
			} catch (error) {
				runtimeLogger.error("live_bar_processing_error", {
					symbol: bar.symbol,
					timestamp: bar.timestamp,
					error: errorMessage(error),
				});
			}
		}
	}

	private releaseWaiters(count: number): void {
		for (const resolve of this.waiters.splice(0, count)) {
			resolve();
		}
	}
}
