import {
	type PortfolioState,
	type Signal,
	totalValue,
	withSize,
} from "@barsim/core";

/**
 * Halts trading once equity has fallen `maxLossPct` below the first point of
 * the equity curve. The curve start stands in for the day's opening equity.
 */
export class MaxDailyLossRule {
	constructor(readonly maxLossPct: number) {}

	validate(portfolio: Readonly<PortfolioState>, currentEquity: number): boolean {
		const first = portfolio.equityCurve[0];
		if (!first) {
			return true;
		}
		const start = first.equity;
		if (start <= 0) {
			return true;
		}
		return (start - currentEquity) / start < this.maxLossPct;
	}
}

export class MaxPositionRule {
	constructor(readonly maxPositionPct: number) {}

	/**
	 * Caps |size| at maxPositionPct × equity / price, equity marked at `price`.
	 * Returns null when no positive cap can be computed.
	 */
	adjust(
		portfolio: Readonly<PortfolioState>,
		symbol: string,
		signal: Signal,
		price: number
	): Signal | null {
		if (!(price > 0)) {
			return null;
		}
		const equity = totalValue(portfolio, { [symbol]: price });
		if (!(equity > 0)) {
			return null;
		}
		const maxQty = (this.maxPositionPct * equity) / price;
		if (!(maxQty > 0)) {
			return null;
		}
		if (Math.abs(signal.size) <= maxQty) {
			return signal;
		}
		return withSize(signal, maxQty);
	}
}
