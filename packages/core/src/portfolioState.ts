import type { MarkPrices, PortfolioState, Signal } from "./types";

/**
 * cash + Σ quantity × mark. A symbol without a supplied mark is valued at its
 * average entry price.
 */
export const totalValue = (
	portfolio: Readonly<PortfolioState>,
	marks: MarkPrices
): number => {
	let value = portfolio.cash;
	for (const [symbol, position] of Object.entries(portfolio.positions)) {
		value += position.quantity * (marks[symbol] ?? position.avgPrice);
	}
	return value;
};

/** cash + Σ avgPrice × quantity, i.e. equity at cost basis. */
export const costBasisEquity = (portfolio: Readonly<PortfolioState>): number => {
	let value = portfolio.cash;
	for (const position of Object.values(portfolio.positions)) {
		value += position.avgPrice * position.quantity;
	}
	return value;
};

export const withSize = (signal: Signal, size: number): Signal => ({
	timestamp: signal.timestamp,
	side: signal.side,
	confidence: signal.confidence,
	size,
});
