import {
	type Bar,
	type PortfolioState,
	type Signal,
	createLogger,
} from "@barsim/core";
import { RollingMean } from "../indicators/rollingMean";
import type { Strategy } from "../types";

const strategyLogger = createLogger("strategy-engine:sma-cross");

export interface SmaCrossConfig {
	fastPeriod: number;
	slowPeriod: number;
	/** Reported on every signal; the engine does not scale size by it. */
	confidence?: number;
}

/**
 * Long-only moving-average crossover. Emits an unsized BUY when the fast mean
 * crosses above the slow mean and an unsized SELL on the reverse cross while
 * a position in the bar's symbol is held.
 */
export class SmaCrossStrategy implements Strategy {
	readonly name = "sma_cross";
	private readonly fast: RollingMean;
	private readonly slow: RollingMean;
	private readonly confidence: number;
	private lastSpread: number | null = null;
	private fills = 0;

	constructor(config: SmaCrossConfig) {
		if (config.fastPeriod >= config.slowPeriod) {
			throw new Error(
				`SmaCrossStrategy fastPeriod (${config.fastPeriod}) must be below slowPeriod (${config.slowPeriod})`
			);
		}
		this.fast = new RollingMean(config.fastPeriod);
		this.slow = new RollingMean(config.slowPeriod);
		this.confidence = Math.min(Math.max(config.confidence ?? 1, 0), 1);
	}

	fit(history: Bar[]): void {
		this.fast.reset();
		this.slow.reset();
		this.lastSpread = null;
		for (const bar of history) {
			this.observe(bar.close);
		}
		strategyLogger.info("strategy_fit", {
			bars: history.length,
			warm: this.slow.ready,
		});
	}

	generateSignal(bar: Bar, portfolio: Readonly<PortfolioState>): Signal | null {
		const previous = this.lastSpread;
		const spread = this.observe(bar.close);
		if (previous === null || spread === null) {
			return null;
		}

		if (previous <= 0 && spread > 0) {
			return this.signal(bar, "BUY");
		}

		const held = portfolio.positions[bar.symbol]?.quantity ?? 0;
		if (previous >= 0 && spread < 0 && held > 0) {
			return this.signal(bar, "SELL");
		}

		return null;
	}

	onFill(signal: Signal): void {
		this.fills += 1;
		strategyLogger.debug("strategy_fill", {
			side: signal.side,
			size: signal.size,
			fills: this.fills,
		});
	}

	get fillCount(): number {
		return this.fills;
	}

	private observe(close: number): number | null {
		this.fast.push(close);
		this.slow.push(close);
		const fast = this.fast.value;
		const slow = this.slow.value;
		this.lastSpread = fast === null || slow === null ? null : fast - slow;
		return this.lastSpread;
	}

	private signal(bar: Bar, side: Signal["side"]): Signal {
		return {
			timestamp: bar.timestamp,
			side,
			confidence: this.confidence,
			size: 0,
		};
	}
}
