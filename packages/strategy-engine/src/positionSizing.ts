import {
	type PortfolioState,
	type Signal,
	type SizingBasis,
	costBasisEquity,
	createLogger,
	totalValue,
} from "@barsim/core";

const sizingLogger = createLogger("strategy-engine:sizing");

export interface SizingOptions {
	/**
	 * "cost" values holdings at their average entry price, which lags true
	 * equity; "mark" values `symbol` at the sizing price.
	 */
	basis?: SizingBasis;
	symbol?: string;
}

/**
 * Fixed-fractional sizing: `equity × fraction / price`.
 * Returns NaN when `price <= 0`; callers treat a non-finite size as no signal.
 */
export const fixedFractional = (
	signal: Signal,
	portfolio: Readonly<PortfolioState>,
	fraction: number,
	price: number,
	options: SizingOptions = {}
): number => {
	if (!(price > 0)) {
		return Number.NaN;
	}
	const basis = options.basis ?? "cost";
	const equity =
		basis === "mark" && options.symbol
			? totalValue(portfolio, { [options.symbol]: price })
			: costBasisEquity(portfolio);
	const size = (equity * fraction) / price;
	sizingLogger.debug("fixed_fractional_size", {
		side: signal.side,
		basis,
		equity,
		fraction,
		price,
		size,
	});
	return size;
};
