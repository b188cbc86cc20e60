import {
	type Bar,
	type OversellPolicy,
	type PortfolioState,
	type Signal,
	type SizingBasis,
	type Trade,
	withSize,
} from "@barsim/core";
import type { Portfolio } from "@barsim/execution-engine";
import type { RiskManager } from "@barsim/risk-engine";
import { type Strategy, fixedFractional } from "@barsim/strategy-engine";
import {
	type RuntimeMode,
	type SkipReason,
	logSignalSkipped,
	logStrategyError,
	logTradeExecuted,
	runtimeLogger,
} from "../runtimeShared";

/** Turns an approved, sized signal into a filled trade at the bar close. */
export type FillFn = (signal: Signal, bar: Bar, quantity: number) => Trade | null;

export interface BarPipeline {
	mode: RuntimeMode;
	symbol: string;
	strategy: Strategy;
	riskManager: RiskManager;
	portfolio: Portfolio;
	sizingFraction: number;
	sizingBasis: SizingBasis;
	oversellPolicy: OversellPolicy;
	fill: FillFn;
}

export interface BarOutcome {
	signal: Signal | null;
	approved: Signal | null;
	trade: Trade | null;
	skipReason: SkipReason | null;
	equity: number;
}

const generateSignal = (
	pipeline: BarPipeline,
	bar: Bar,
	snapshot: PortfolioState
): Signal | null => {
	try {
		return pipeline.strategy.generateSignal(bar, snapshot);
	} catch (error) {
		logStrategyError(pipeline.mode, bar, error, "generate_signal");
		return null;
	}
};

/** The trade is already booked, so a throwing callback must not unwind the bar. */
const notifyFill = (pipeline: BarPipeline, bar: Bar, approved: Signal): void => {
	try {
		pipeline.strategy.onFill(approved);
	} catch (error) {
		logStrategyError(pipeline.mode, bar, error, "on_fill");
	}
};

/**
 * Signal, gate, size, gate, fill. The two risk gates share one RiskManager so
 * a breach seen at either phase halts the session.
 */
const executeSignal = (
	pipeline: BarPipeline,
	bar: Bar,
	snapshot: PortfolioState,
	signal: Signal
): { approved: Signal | null; trade: Trade | null; skipReason: SkipReason | null } => {
	const price = bar.close;
	const { riskManager, symbol, mode } = pipeline;

	const preApproved = riskManager.approve(signal, snapshot, price, symbol, "pre_sizing");
	if (!preApproved) {
		logSignalSkipped(mode, bar, "risk_rejected", signal, "pre_sizing");
		return { approved: null, trade: null, skipReason: "risk_rejected" };
	}

	const size = fixedFractional(preApproved, snapshot, pipeline.sizingFraction, price, {
		basis: pipeline.sizingBasis,
		symbol,
	});
	if (!Number.isFinite(size)) {
		logSignalSkipped(mode, bar, "non_finite_size", preApproved);
		return { approved: null, trade: null, skipReason: "non_finite_size" };
	}

	const sized = withSize(preApproved, size);
	const approved = riskManager.approve(sized, snapshot, price, symbol, "post_sizing");
	if (!approved) {
		logSignalSkipped(mode, bar, "risk_rejected", sized, "post_sizing");
		return { approved: null, trade: null, skipReason: "risk_rejected" };
	}

	const quantity = Math.abs(approved.size);
	if (quantity === 0) {
		logSignalSkipped(mode, bar, "zero_size", approved);
		return { approved, trade: null, skipReason: "zero_size" };
	}

	if (approved.side === "SELL") {
		const held = pipeline.portfolio.heldQuantity(symbol);
		if (quantity > held && pipeline.oversellPolicy === "reject") {
			runtimeLogger.warn("oversell_rejected", {
				mode,
				symbol,
				held,
				requested: quantity,
				timestamp: bar.timestamp,
			});
			return { approved, trade: null, skipReason: "oversell_rejected" };
		}
	}

	const trade = pipeline.fill(approved, bar, quantity);
	if (!trade) {
		logSignalSkipped(mode, bar, "execution_failed", approved);
		return { approved, trade: null, skipReason: "execution_failed" };
	}

	pipeline.portfolio.applyTrade(trade);
	logTradeExecuted(mode, trade, pipeline.portfolio.cash);
	notifyFill(pipeline, bar, approved);
	return { approved, trade, skipReason: null };
};

/**
 * Processes one bar end to end and appends its equity point. Synchronous, so a
 * bar is either fully applied or not started.
 */
export const runBar = (pipeline: BarPipeline, bar: Bar): BarOutcome => {
	const snapshot = pipeline.portfolio.snapshot();
	const signal = generateSignal(pipeline, bar, snapshot);

	let result: ReturnType<typeof executeSignal> = {
		approved: null,
		trade: null,
		skipReason: "no_signal",
	};
	if (signal && !Number.isFinite(signal.size)) {
		logSignalSkipped(pipeline.mode, bar, "non_finite_size", signal);
		result = { approved: null, trade: null, skipReason: "non_finite_size" };
	} else if (signal) {
		result = executeSignal(pipeline, bar, snapshot, signal);
	}

	const equity = pipeline.portfolio.markToMarket({ [pipeline.symbol]: bar.close });
	pipeline.portfolio.recordEquity(bar.timestamp, equity);

	return { signal, ...result, equity };
};
