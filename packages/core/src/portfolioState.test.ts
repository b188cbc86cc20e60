import { describe, expect, it } from "vitest";
import {
	costBasisEquity,
	totalValue,
	withSize,
} from "./portfolioState";
import type { PortfolioState, Signal } from "./types";

const buildState = (): PortfolioState => ({
	cash: 5_000,
	positions: {
		BTC: { symbol: "BTC", quantity: 2, avgPrice: 100 },
		ETH: { symbol: "ETH", quantity: 10, avgPrice: 20 },
	},
	equityCurve: [{ timestamp: 1, equity: 5_400 }],
});

describe("portfolio state helpers", () => {
	it("marks positions and falls back to avg price for missing marks", () => {
		expect(totalValue(buildState(), { BTC: 150 })).toBe(5_000 + 300 + 200);
	});

	it("values positions at cost basis", () => {
		expect(costBasisEquity(buildState())).toBe(5_400);
	});

	it("resizes a signal into a new object", () => {
		const signal: Signal = { timestamp: 1, side: "BUY", confidence: 0.7, size: 3 };
		const resized = withSize(signal, 1.5);
		expect(resized).toEqual({ timestamp: 1, side: "BUY", confidence: 0.7, size: 1.5 });
		expect(signal.size).toBe(3);
	});
});
