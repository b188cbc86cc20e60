import type { Bar, PortfolioState, Signal, Side } from "@barsim/core";
import type { Strategy } from "@barsim/strategy-engine";

export const SYMBOL = "BTC/USDT";
export const MINUTE = 60_000;

export const bar = (minute: number, close: number): Bar => ({
	symbol: SYMBOL,
	timeframe: "1m",
	timestamp: minute * MINUTE,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
});

export const signalAt = (minute: number, side: Side, size = 0): Signal => ({
	timestamp: minute * MINUTE,
	side,
	confidence: 1,
	size,
});

/** Emits pre-arranged signals keyed by bar timestamp. */
export class ScriptedStrategy implements Strategy {
	readonly name = "scripted";
	readonly fills: Signal[] = [];
	readonly snapshots: PortfolioState[] = [];
	fitted: Bar[] = [];

	constructor(
		private readonly script: Record<number, Signal | Error> = {},
		private readonly mutateSnapshots = false
	) {}

	fit(history: Bar[]): void {
		this.fitted = history;
	}

	generateSignal(current: Bar, portfolio: Readonly<PortfolioState>): Signal | null {
		const step = this.script[current.timestamp];
		if (this.mutateSnapshots) {
			this.snapshots.push(portfolio);
			const held = portfolio.positions[SYMBOL];
			if (held) {
				held.quantity = -1;
			}
		}
		if (step instanceof Error) {
			throw step;
		}
		return step ?? null;
	}

	onFill(signal: Signal): void {
		this.fills.push(signal);
	}
}

export const script = (
	entries: Array<[minute: number, value: Signal | Error]>
): Record<number, Signal | Error> => {
	const result: Record<number, Signal | Error> = {};
	for (const [minute, value] of entries) {
		result[minute * MINUTE] = value;
	}
	return result;
};

/** Records each fill, then throws from the callback. */
export class ThrowingFillStrategy extends ScriptedStrategy {
	onFill(signal: Signal): void {
		super.onFill(signal);
		throw new Error("fill callback failed");
	}
}
