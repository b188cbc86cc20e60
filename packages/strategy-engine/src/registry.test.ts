import { describe, expect, it } from "vitest";
import { createStrategy, listStrategyIds } from "./registry";
import { SmaCrossStrategy } from "./sma-cross/SmaCrossStrategy";

describe("strategy registry", () => {
	it("lists the bundled strategies", () => {
		expect(listStrategyIds()).toEqual(["sma_cross"]);
	});

	it("builds a strategy from its config", () => {
		const strategy = createStrategy({ id: "sma_cross", fastPeriod: 3, slowPeriod: 8 });
		expect(strategy).toBeInstanceOf(SmaCrossStrategy);
		expect(strategy.name).toBe("sma_cross");
	});

	it("rejects unknown ids", () => {
		expect(() => createStrategy({ id: "martingale" })).toThrowError(
			'Unknown strategy id "martingale". Known ids: sma_cross'
		);
	});

	it("names a missing numeric parameter", () => {
		expect(() => createStrategy({ id: "sma_cross", fastPeriod: 3 })).toThrowError(
			'Strategy sma_cross requires numeric "slowPeriod"'
		);
	});
});
