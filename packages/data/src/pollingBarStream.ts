import { type Bar, createLogger } from "@barsim/core";
import { SyntheticBarGenerator } from "./syntheticBars";
import type {
	BarHandler,
	MarketDataClient,
	MarketDataStream,
	PollingBarStreamOptions,
} from "./types";

const streamLogger = createLogger("data:stream");

export interface PollingBarStreamDeps {
	synthetic?: SyntheticBarGenerator;
}

/**
 * Polls the two newest bars from a client on a fixed interval and emits the
 * older one, the last closed bar, when its timestamp advances. The newest bar
 * is still forming and is never emitted. Consecutive fetch failures are retried after
 * `reconnectDelayMs`; after `maxReconnectAttempts` of them (or with no client
 * at all) the stream degrades to synthetic bars when allowed.
 */
export class PollingBarStream implements MarketDataStream {
	private readonly listeners = new Set<BarHandler>();
	private readonly pollIntervalMs: number;
	private readonly reconnectDelayMs: number;
	private readonly maxReconnectAttempts: number;
	private readonly syntheticFallback: boolean;
	private readonly synthetic: SyntheticBarGenerator;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private inflight: Promise<void> | null = null;
	private running = false;
	private closed = false;
	private degraded = false;
	private failures = 0;
	private lastTimestamp: number | null;

	constructor(
		private readonly client: MarketDataClient | null,
		private readonly options: PollingBarStreamOptions,
		deps: PollingBarStreamDeps = {}
	) {
		this.pollIntervalMs = Math.max(options.pollIntervalMs ?? 10_000, 0);
		this.reconnectDelayMs = Math.max(options.reconnectDelayMs ?? 5_000, 0);
		this.maxReconnectAttempts = Math.max(options.maxReconnectAttempts ?? 5, 1);
		this.syntheticFallback = options.syntheticFallback ?? true;
		this.lastTimestamp = options.startAfter ?? null;
		if (!client && !this.syntheticFallback) {
			throw new Error(
				"PollingBarStream requires a market data client when syntheticFallback is disabled"
			);
		}
		this.synthetic =
			deps.synthetic ??
			new SyntheticBarGenerator({
				symbol: options.symbol,
				timeframe: options.timeframe,
			});
	}

	get isDegraded(): boolean {
		return this.degraded;
	}

	start(): void {
		if (this.running || this.closed) {
			return;
		}
		this.running = true;
		if (!this.client) {
			this.degrade("no_client");
		}
		this.schedule(0);
	}

	/** Closes the client once, whether or not the stream was ever started. */
	async stop(): Promise<void> {
		const wasRunning = this.running;
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.inflight) {
			await this.inflight;
		}
		if (this.closed) {
			return;
		}
		this.closed = true;
		if (this.client?.close) {
			await this.client.close();
		}
		streamLogger.info("stream_stopped", {
			symbol: this.options.symbol,
			degraded: this.degraded,
			started: wasRunning,
		});
	}

	onBar(handler: BarHandler): () => void {
		this.listeners.add(handler);
		return () => this.listeners.delete(handler);
	}

	private schedule(delayMs: number): void {
		if (!this.running) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			this.inflight = this.tick().finally(() => {
				this.inflight = null;
			});
		}, delayMs);
	}

	private async tick(): Promise<void> {
		if (!this.running) {
			return;
		}

		if (this.degraded || !this.client) {
			await this.emit(this.synthetic.next());
			this.schedule(this.pollIntervalMs);
			return;
		}

		try {
			const bars = await this.client.fetchOHLCV(
				this.options.symbol,
				this.options.timeframe,
				2
			);
			this.failures = 0;
			if (!this.running) {
				return;
			}
			const lastClosed = bars.length >= 2 ? bars[bars.length - 2] : undefined;
			if (
				lastClosed &&
				(this.lastTimestamp === null || lastClosed.timestamp > this.lastTimestamp)
			) {
				this.lastTimestamp = lastClosed.timestamp;
				this.synthetic.seed(lastClosed);
				await this.emit(lastClosed);
			}
			this.schedule(this.pollIntervalMs);
		} catch (error) {
			this.failures += 1;
			streamLogger.warn("stream_poll_failed", {
				symbol: this.options.symbol,
				attempt: this.failures,
				maxReconnectAttempts: this.maxReconnectAttempts,
				message: error instanceof Error ? error.message : String(error),
			});
			if (this.failures >= this.maxReconnectAttempts && this.syntheticFallback) {
				this.degrade("max_reconnect_attempts");
				this.schedule(0);
				return;
			}
			this.schedule(this.reconnectDelayMs);
		}
	}

	private degrade(reason: string): void {
		this.degraded = true;
		streamLogger.warn("stream_degraded", {
			symbol: this.options.symbol,
			timeframe: this.options.timeframe,
			reason,
		});
	}

	private async emit(bar: Bar): Promise<void> {
		if (!this.listeners.size) {
			return;
		}
		const listeners = Array.from(this.listeners);
		await Promise.allSettled(
			listeners.map(async (listener) => {
				try {
					await listener(bar);
				} catch (error) {
					streamLogger.error("stream_listener_error", {
						timestamp: bar.timestamp,
						message: error instanceof Error ? error.message : String(error),
					});
				}
			})
		);
	}
}
