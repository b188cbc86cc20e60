export { runBar } from "./loop/runBar";
export type { BarOutcome, BarPipeline, FillFn } from "./loop/runBar";
export { runBacktest } from "./backtest/backtestRunner";
export type {
	BacktestConfig,
	BacktestResolvedConfig,
	BacktestResult,
	RunBacktestOptions,
} from "./backtest/backtestTypes";
export { BarQueue, DEFAULT_QUEUE_CAPACITY } from "./live/barQueue";
export type { BarWorker } from "./live/barQueue";
export { LiveSession } from "./live/liveSession";
export { startLivePaper } from "./live/livePaperRunner";
export type {
	LivePaperConfig,
	LivePaperHandle,
	StartLivePaperOptions,
} from "./live/livePaperRunner";
export { runtimeLogger } from "./runtimeShared";
export type { RuntimeMode, SkipReason, StrategyStage } from "./runtimeShared";
