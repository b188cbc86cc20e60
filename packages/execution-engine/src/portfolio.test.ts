import { describe, expect, it } from "vitest";
import type { Trade } from "@barsim/core";
import { Portfolio } from "./portfolio";

const symbol = "BTC/USDT";

const trade = (overrides: Partial<Trade>): Trade => ({
	orderId: "ord-1",
	symbol,
	side: "BUY",
	quantity: 1,
	price: 100,
	fee: 0,
	timestamp: 0,
	...overrides,
});

describe("Portfolio", () => {
	it("averages entry price on buys and keeps it on sells", () => {
		const portfolio = new Portfolio(10_000);
		portfolio.updatePosition(symbol, "BUY", 10, 100);
		portfolio.updatePosition(symbol, "BUY", 10, 200);
		expect(portfolio.getPosition(symbol)).toEqual({
			symbol,
			quantity: 20,
			avgPrice: 150,
		});
		expect(portfolio.cash).toBe(7_000);

		portfolio.updatePosition(symbol, "SELL", 5, 300);
		expect(portfolio.getPosition(symbol)).toEqual({
			symbol,
			quantity: 15,
			avgPrice: 150,
		});
		expect(portfolio.cash).toBe(8_500);
	});

	it("clamps an oversell at zero and credits the full proceeds", () => {
		const portfolio = new Portfolio(10_000);
		portfolio.updatePosition(symbol, "BUY", 10, 100);
		portfolio.updatePosition(symbol, "SELL", 20, 100);
		expect(portfolio.getPosition(symbol)?.quantity).toBe(0);
		expect(portfolio.cash).toBe(11_000);
		expect(portfolio.snapshot().positions[symbol]).toEqual({
			symbol,
			quantity: 0,
			avgPrice: 100,
		});
	});

	it("charges fees on top of notional when applying trades", () => {
		const portfolio = new Portfolio(10_000);
		portfolio.applyTrade(trade({ quantity: 2, price: 50, fee: 0.25 }));
		expect(portfolio.cash).toBe(9_899.75);
		portfolio.applyTrade(trade({ side: "SELL", quantity: 2, price: 60, fee: 0.5 }));
		expect(portfolio.cash).toBe(10_019.25);
		expect(portfolio.heldQuantity(symbol)).toBe(0);
	});

	it("conserves cash across a sequence of trades", () => {
		const portfolio = new Portfolio(5_000);
		const trades = [
			trade({ quantity: 3, price: 100, fee: 1 }),
			trade({ quantity: 1, price: 120, fee: 0.5 }),
			trade({ side: "SELL", quantity: 2, price: 130, fee: 0.75 }),
			trade({ side: "SELL", quantity: 4, price: 90, fee: 0.25 }),
		];
		let expected = 5_000;
		for (const item of trades) {
			portfolio.applyTrade(item);
			const notional = item.quantity * item.price;
			expected += (item.side === "BUY" ? -notional : notional) - item.fee;
		}
		expect(portfolio.cash).toBe(expected);
	});

	it("marks positions, falling back to the average price", () => {
		const portfolio = new Portfolio(10_000);
		portfolio.updatePosition(symbol, "BUY", 10, 100);
		portfolio.updatePosition("ETH/USDT", "BUY", 5, 20);
		expect(portfolio.markToMarket({ [symbol]: 120 })).toBe(10_200);
		expect(portfolio.markToMarket({})).toBe(10_000);
	});

	it("rejects equity points that do not advance in time", () => {
		const portfolio = new Portfolio(1_000);
		portfolio.recordEquity(60_000, 1_000);
		expect(() => portfolio.recordEquity(60_000, 1_001)).toThrowError(
			"Equity timestamp 60000 must be after the last recorded 60000"
		);
		portfolio.recordEquity(120_000, 1_002);
		expect(portfolio.equityCurve).toEqual([
			{ timestamp: 60_000, equity: 1_000 },
			{ timestamp: 120_000, equity: 1_002 },
		]);
	});

	it("hands out snapshots that do not alias internal state", () => {
		const portfolio = new Portfolio(1_000);
		portfolio.updatePosition(symbol, "BUY", 1, 100);
		portfolio.recordEquity(1, 1_000);
		const snapshot = portfolio.snapshot();
		const position = snapshot.positions[symbol];
		if (position) {
			position.quantity = 99;
		}
		snapshot.equityCurve.push({ timestamp: 2, equity: 0 });
		snapshot.cash = 0;

		expect(portfolio.heldQuantity(symbol)).toBe(1);
		expect(portfolio.equityCurve).toHaveLength(1);
		expect(portfolio.cash).toBe(900);
	});
});
