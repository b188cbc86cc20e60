import { type Bar, bucketTimestamp, timeframeToMs } from "@barsim/core";

export interface SyntheticBarOptions {
	symbol: string;
	timeframe: string;
	startPrice?: number;
	/** Largest fractional move per bar. */
	volatility?: number;
	random?: () => number;
	now?: () => number;
}

/**
 * Random walk around the last close, one timeframe step per bar. Used when a
 * live feed is unavailable so a paper session keeps producing bars.
 */
export class SyntheticBarGenerator {
	private readonly tfMs: number;
	private readonly volatility: number;
	private readonly random: () => number;
	private readonly now: () => number;
	private lastClose: number;
	private lastTimestamp: number | null = null;

	constructor(private readonly options: SyntheticBarOptions) {
		this.tfMs = timeframeToMs(options.timeframe);
		this.volatility = options.volatility ?? 0.001;
		this.random = options.random ?? Math.random;
		this.now = options.now ?? Date.now;
		this.lastClose = options.startPrice ?? 100;
	}

	/** Continue the walk from a real bar. */
	seed(bar: Bar): void {
		this.lastClose = bar.close;
		this.lastTimestamp = bar.timestamp;
	}

	next(): Bar {
		const timestamp =
			this.lastTimestamp === null
				? bucketTimestamp(this.now(), this.tfMs)
				: this.lastTimestamp + this.tfMs;
		const open = this.lastClose;
		const drift = this.volatility * (2 * this.random() - 1);
		const close = Math.max(open * (1 + drift), Number.EPSILON);
		const wick = open * this.volatility * this.random();

		this.lastClose = close;
		this.lastTimestamp = timestamp;

		return {
			symbol: this.options.symbol,
			timeframe: this.options.timeframe,
			timestamp,
			open,
			high: Math.max(open, close) + wick,
			low: Math.max(Math.min(open, close) - wick, Number.EPSILON),
			close,
			volume: Math.round(1_000 * this.random()),
		};
	}
}
