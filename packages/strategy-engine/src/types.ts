import type { Bar, PortfolioState, Signal } from "@barsim/core";

/**
 * Signal source driven once per bar by both the backtest engine and the live
 * paper runner. Implementations must treat the portfolio snapshot as
 * read-only and must stay synchronous: the backtest has no suspension points.
 */
export interface Strategy {
	readonly name: string;
	/** Warm internal state from history before the first live or replayed bar. */
	fit(history: Bar[]): void;
	generateSignal(bar: Bar, portfolio: Readonly<PortfolioState>): Signal | null;
	onFill(signal: Signal): void;
}
