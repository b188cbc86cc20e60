import { type Bar, type Signal, type Trade, createLogger } from "@barsim/core";
import type { RiskPhase } from "@barsim/risk-engine";

export const runtimeLogger = createLogger("runtime");

export type RuntimeMode = "backtest" | "paper";

export type SkipReason =
	| "no_signal"
	| "non_finite_size"
	| "risk_rejected"
	| "zero_size"
	| "oversell_rejected"
	| "execution_failed";

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export type StrategyStage = "generate_signal" | "on_fill";

export const logStrategyError = (
	mode: RuntimeMode,
	bar: Bar,
	error: unknown,
	stage: StrategyStage
): void => {
	runtimeLogger.error("strategy_error", {
		mode,
		stage,
		symbol: bar.symbol,
		timestamp: bar.timestamp,
		error: errorMessage(error),
	});
};

export const logSignalSkipped = (
	mode: RuntimeMode,
	bar: Bar,
	reason: SkipReason,
	signal: Signal | null,
	phase?: RiskPhase
): void => {
	runtimeLogger.debug("signal_skipped", {
		mode,
		reason,
		phase: phase ?? null,
		timestamp: bar.timestamp,
		side: signal?.side ?? null,
		size: signal?.size ?? null,
	});
};

export const logTradeExecuted = (mode: RuntimeMode, trade: Trade, cash: number): void => {
	runtimeLogger.info("trade_executed", {
		mode,
		orderId: trade.orderId,
		symbol: trade.symbol,
		side: trade.side,
		quantity: trade.quantity,
		price: trade.price,
		fee: trade.fee,
		cash,
		timestamp: trade.timestamp,
	});
};
