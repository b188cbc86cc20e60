import type { StrategyConfig } from "@barsim/core";
import { SmaCrossStrategy } from "./sma-cross/SmaCrossStrategy";
import type { Strategy } from "./types";

type StrategyFactory = (config: StrategyConfig) => Strategy;

const readNumber = (config: StrategyConfig, field: string): number => {
	const value = config[field];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Strategy ${config.id} requires numeric "${field}"`);
	}
	return value;
};

const readOptionalNumber = (
	config: StrategyConfig,
	field: string
): number | undefined =>
	config[field] === undefined ? undefined : readNumber(config, field);

const STRATEGY_FACTORIES: Record<string, StrategyFactory> = {
	sma_cross: (config) =>
		new SmaCrossStrategy({
			fastPeriod: readNumber(config, "fastPeriod"),
			slowPeriod: readNumber(config, "slowPeriod"),
			confidence: readOptionalNumber(config, "confidence"),
		}),
};

export const listStrategyIds = (): string[] => Object.keys(STRATEGY_FACTORIES);

export const createStrategy = (config: StrategyConfig): Strategy => {
	const factory = STRATEGY_FACTORIES[config.id];
	if (!factory) {
		throw new Error(
			`Unknown strategy id "${config.id}". Known ids: ${listStrategyIds().join(", ")}`
		);
	}
	return factory(config);
};
