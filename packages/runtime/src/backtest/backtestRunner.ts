import { type Bar, createOrderIdFactory } from "@barsim/core";
import { Portfolio, simulateFill } from "@barsim/execution-engine";
import { RiskManager } from "@barsim/risk-engine";
import type { Strategy } from "@barsim/strategy-engine";
import { type BarPipeline, runBar } from "../loop/runBar";
import { runtimeLogger } from "../runtimeShared";
import type {
	BacktestConfig,
	BacktestResolvedConfig,
	BacktestResult,
	RunBacktestOptions,
} from "./backtestTypes";

const resolveConfig = (config: BacktestConfig): BacktestResolvedConfig => ({
	symbol: config.symbol,
	initialCash: config.initialCash,
	sizingFraction: config.sizingFraction,
	risk: { ...config.risk },
	sizingBasis: config.sizingBasis ?? "cost",
	slippagePct: config.slippagePct ?? 0,
	slippageAbs: config.slippageAbs ?? 0,
	feeRate: config.feeRate ?? 0,
	oversellPolicy: config.oversellPolicy ?? "clamp",
});

const assertAscending = (bars: readonly Bar[]): void => {
	for (let i = 1; i < bars.length; i += 1) {
		const prev = bars[i - 1];
		const bar = bars[i];
		if (prev && bar && bar.timestamp <= prev.timestamp) {
			throw new Error(
				`Backtest bars must be strictly ascending: bar ${i} at ${bar.timestamp} follows ${prev.timestamp}`
			);
		}
	}
};

/**
 * Replays `bars` through the strategy, fills at each bar's close and records
 * one equity point per bar.
 */
export const runBacktest = (
	bars: readonly Bar[],
	strategy: Strategy,
	config: BacktestConfig,
	options: RunBacktestOptions = {}
): BacktestResult => {
	assertAscending(bars);
	const resolved = resolveConfig(config);
	const portfolio = new Portfolio(resolved.initialCash);
	const riskManager = options.riskManager ?? new RiskManager(resolved.risk);
	const fillModel = {
		slippagePct: resolved.slippagePct,
		slippageAbs: resolved.slippageAbs,
		feeRate: resolved.feeRate,
	};
	let clock = 0;
	const nextOrderId = createOrderIdFactory(options.orderIdPrefix ?? "bt", () => clock);
	const trades: BacktestResult["trades"] = [];

	runtimeLogger.info("backtest_started", {
		symbol: resolved.symbol,
		strategy: strategy.name,
		bars: bars.length,
		initialCash: resolved.initialCash,
		sizingFraction: resolved.sizingFraction,
		sizingBasis: resolved.sizingBasis,
		oversellPolicy: resolved.oversellPolicy,
	});

	const pipeline: BarPipeline = {
		mode: "backtest",
		symbol: resolved.symbol,
		strategy,
		riskManager,
		portfolio,
		sizingFraction: resolved.sizingFraction,
		sizingBasis: resolved.sizingBasis,
		oversellPolicy: resolved.oversellPolicy,
		fill: (signal, bar, quantity) =>
			simulateFill(
				{
					orderId: nextOrderId(),
					symbol: resolved.symbol,
					side: signal.side,
					quantity,
					price: bar.close,
					timestamp: bar.timestamp,
				},
				fillModel
			),
	};

	for (const bar of bars) {
		clock = bar.timestamp;
		const outcome = runBar(pipeline, bar);
		if (outcome.trade) {
			trades.push(outcome.trade);
		}
	}

	const state = portfolio.snapshot();
	runtimeLogger.info("backtest_completed", {
		symbol: resolved.symbol,
		barsProcessed: bars.length,
		trades: trades.length,
		finalEquity: state.equityCurve[state.equityCurve.length - 1]?.equity ?? resolved.initialCash,
		riskState: riskManager.state,
	});

	return {
		config: resolved,
		portfolio: state,
		trades,
		equityCurve: state.equityCurve,
		riskState: riskManager.state,
		barsProcessed: bars.length,
	};
};
