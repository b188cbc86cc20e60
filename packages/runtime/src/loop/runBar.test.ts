import { describe, expect, it } from "vitest";
import { Portfolio, simulateFill } from "@barsim/execution-engine";
import { RiskManager } from "@barsim/risk-engine";
import { type BarPipeline, runBar } from "./runBar";
import {
	SYMBOL,
	ScriptedStrategy,
	ThrowingFillStrategy,
	bar,
	script,
	signalAt,
} from "../__tests__/fixtures";

const pipeline = (strategy: ScriptedStrategy, portfolio = new Portfolio(1_000)): BarPipeline => ({
	mode: "backtest",
	symbol: SYMBOL,
	strategy,
	riskManager: new RiskManager({ maxDailyLossPct: 0.5, maxPositionPct: 1 }),
	portfolio,
	sizingFraction: 0.1,
	sizingBasis: "mark",
	oversellPolicy: "clamp",
	fill: (signal, current, quantity) =>
		simulateFill({
			orderId: "fill-1",
			symbol: SYMBOL,
			side: signal.side,
			quantity,
			price: current.close,
			timestamp: current.timestamp,
		}),
});

describe("runBar", () => {
	it("reports a quiet bar as no_signal and still records equity", () => {
		const portfolio = new Portfolio(1_000);
		const outcome = runBar(pipeline(new ScriptedStrategy(), portfolio), bar(1, 10));
		expect(outcome).toEqual({
			signal: null,
			approved: null,
			trade: null,
			skipReason: "no_signal",
			equity: 1_000,
		});
		expect(portfolio.equityCurve).toHaveLength(1);
	});

	it("sizes on marked equity when configured", () => {
		const portfolio = new Portfolio(1_000);
		portfolio.updatePosition(SYMBOL, "BUY", 10, 10);
		const strategy = new ScriptedStrategy(script([[1, signalAt(1, "BUY")]]));
		// marked equity = 900 + 10 * 20 = 1100 -> 1100 * 0.1 / 20
		const outcome = runBar(pipeline(strategy, portfolio), bar(1, 20));
		expect(outcome.trade?.quantity).toBeCloseTo(5.5, 10);
		expect(outcome.skipReason).toBeNull();
	});

	it("returns execution_failed when the fill produces no trade", () => {
		const strategy = new ScriptedStrategy(script([[1, signalAt(1, "BUY")]]));
		const outcome = runBar({ ...pipeline(strategy), fill: () => null }, bar(1, 10));
		expect(outcome.skipReason).toBe("execution_failed");
		expect(outcome.equity).toBe(1_000);
		expect(strategy.fills).toEqual([]);
	});

	it("keeps the booked trade and the equity point when onFill throws", () => {
		const portfolio = new Portfolio(1_000);
		const strategy = new ThrowingFillStrategy(script([[1, signalAt(1, "BUY")]]));
		const outcome = runBar(pipeline(strategy, portfolio), bar(1, 10));

		expect(outcome.skipReason).toBeNull();
		expect(outcome.trade?.quantity).toBe(10);
		expect(outcome.equity).toBe(1_000);
		expect(strategy.fills).toEqual([signalAt(1, "BUY", 10)]);
		expect(portfolio.cash).toBe(900);
		expect(portfolio.equityCurve).toEqual([{ timestamp: 60_000, equity: 1_000 }]);
	});
});
