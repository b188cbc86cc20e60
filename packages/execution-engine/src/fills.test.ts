import { describe, expect, it } from "vitest";
import { simulateFill, slippedPrice } from "./fills";

const model = { slippagePct: 0.01, slippageAbs: 0.5, feeRate: 0.001 };

describe("simulateFill", () => {
	it("fills at the requested price without costs by default", () => {
		expect(
			simulateFill({
				orderId: "bt-1",
				symbol: "BTC/USDT",
				side: "BUY",
				quantity: 2,
				price: 100,
				timestamp: 5,
			})
		).toEqual({
			orderId: "bt-1",
			symbol: "BTC/USDT",
			side: "BUY",
			quantity: 2,
			price: 100,
			fee: 0,
			timestamp: 5,
		});
	});

	it("moves the price against the taker", () => {
		expect(slippedPrice("BUY", 100, model)).toBeCloseTo(101.5, 10);
		expect(slippedPrice("SELL", 100, model)).toBeCloseTo(98.5, 10);
	});

	it("charges the fee on the slipped price and freezes the trade", () => {
		const trade = simulateFill(
			{
				orderId: "bt-2",
				symbol: "BTC/USDT",
				side: "BUY",
				quantity: 2,
				price: 100,
				timestamp: 5,
			},
			model
		);
		expect(trade.fee).toBeCloseTo(0.203, 10);
		expect(Object.isFrozen(trade)).toBe(true);
	});
});
