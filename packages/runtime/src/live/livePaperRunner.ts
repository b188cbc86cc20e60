import {
	type Bar,
	type LiveSessionState,
	type OversellPolicy,
	type RiskConfig,
	type SizingBasis,
	createOrderIdFactory,
} from "@barsim/core";
import type { MarketDataStream } from "@barsim/data";
import { PaperBroker } from "@barsim/execution-engine";
import { RiskManager } from "@barsim/risk-engine";
import type { Strategy } from "@barsim/strategy-engine";
import { type BarPipeline, runBar } from "../loop/runBar";
import { errorMessage, runtimeLogger } from "../runtimeShared";
import { BarQueue, DEFAULT_QUEUE_CAPACITY } from "./barQueue";
import { LiveSession } from "./liveSession";

export interface LivePaperConfig {
	symbol: string;
	initialCash: number;
	sizingFraction: number;
	risk: RiskConfig;
	sizingBasis?: SizingBasis;
	oversellPolicy?: OversellPolicy;
	feeRate?: number;
	latencyMs?: number;
	queueCapacity?: number;
}

export interface StartLivePaperOptions {
	stream: MarketDataStream;
	strategy: Strategy;
	riskManager?: RiskManager;
	broker?: PaperBroker;
	/** Bars handed to `strategy.fit` before the stream starts. */
	history?: Bar[];
	signal?: AbortSignal;
	now?: () => number;
}

export interface LivePaperHandle {
	readonly session: LiveSession;
	readonly riskManager: RiskManager;
	readonly broker: PaperBroker;
	/** Settles with the final state once the session has stopped. */
	readonly finished: Promise<LiveSessionState>;
	stop(): Promise<LiveSessionState>;
}

/**
 * Starts a paper session on `stream`. Bars flow through a bounded queue into
 * the shared bar pipeline; fills go through the paper broker at the bar close.
 * Runs until `stop()` is called or `signal` aborts.
 */
export const startLivePaper = (
	config: LivePaperConfig,
	options: StartLivePaperOptions
): LivePaperHandle => {
	const now = options.now ?? Date.now;
	const session = new LiveSession(config.initialCash, now());
	const riskManager = options.riskManager ?? new RiskManager(config.risk);
	const broker =
		options.broker ??
		new PaperBroker({ feeRate: config.feeRate, latencyMs: config.latencyMs });
	const nextOrderId = createOrderIdFactory("ord", now);
	const { strategy, stream } = options;

	const lastHistoryBar = options.history?.[options.history.length - 1];
	if (options.history && lastHistoryBar) {
		strategy.fit(options.history);
		// The strategy has seen these bars; a streamed copy must not be replayed.
		session.accept(lastHistoryBar.timestamp);
	}

	const pipeline: BarPipeline = {
		mode: "paper",
		symbol: config.symbol,
		strategy,
		riskManager,
		portfolio: session.portfolio,
		sizingFraction: config.sizingFraction,
		sizingBasis: config.sizingBasis ?? "cost",
		oversellPolicy: config.oversellPolicy ?? "clamp",
		fill: (signal, bar, quantity) => {
			const result = broker.execute(
				{
					id: nextOrderId(),
					symbol: config.symbol,
					side: signal.side,
					quantity,
					type: "MARKET",
					price: bar.close,
					timestamp: bar.timestamp,
				},
				bar.close
			);
			runtimeLogger.debug("paper_execution", { message: result.message });
			return result.success && result.trade ? result.trade : null;
		},
	};

	const handleBar = (bar: Bar): void => {
		if (!session.accept(bar.timestamp)) {
			runtimeLogger.debug("bar_out_of_order_dropped", {
				timestamp: bar.timestamp,
				lastTimestamp: session.lastBarTimestamp,
			});
			return;
		}
		const outcome = runBar(pipeline, bar);
		if (outcome.trade) {
			session.recordTrade(outcome.trade);
		}
	};

	const queue = new BarQueue(handleBar, config.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
	const unsubscribe = stream.onBar(async (bar) => {
		await queue.push(bar);
	});

	let resolveFinished: (state: LiveSessionState) => void = () => undefined;
	const finished = new Promise<LiveSessionState>((resolve) => {
		resolveFinished = resolve;
	});

	const shutdown = async (): Promise<LiveSessionState> => {
		unsubscribe();
		options.signal?.removeEventListener("abort", onAbort);
		const discarded = await queue.close();
		try {
			await stream.stop();
		} catch (error) {
			runtimeLogger.error("stream_stop_failed", { error: errorMessage(error) });
		}
		const state = session.toState();
		const lastPoint = state.portfolio.equityCurve[state.portfolio.equityCurve.length - 1];
		runtimeLogger.info("live_session_stopped", {
			symbol: config.symbol,
			barsProcessed: state.portfolio.equityCurve.length,
			discardedBars: discarded,
			trades: state.trades.length,
			cash: state.portfolio.cash,
			equity: lastPoint?.equity ?? config.initialCash,
			riskState: riskManager.state,
		});
		resolveFinished(state);
		return state;
	};

	let stopping: Promise<LiveSessionState> | null = null;
	const stop = (): Promise<LiveSessionState> => {
		if (!stopping) {
			stopping = shutdown();
		}
		return stopping;
	};

	function onAbort(): void {
		void stop();
	}

	runtimeLogger.info("live_session_started", {
		symbol: config.symbol,
		strategy: strategy.name,
		initialCash: config.initialCash,
		queueCapacity: config.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
		warmupBars: options.history?.length ?? 0,
	});

	if (options.signal?.aborted) {
		void stop();
	} else {
		options.signal?.addEventListener("abort", onAbort, { once: true });
		stream.start();
	}

	return { session, riskManager, broker, finished, stop };
};
