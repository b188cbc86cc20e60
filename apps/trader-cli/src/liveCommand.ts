import {
	type ArgValue,
	type Bar,
	type ConfigLoadOptions,
	createLogger,
	getNumberArg,
	getStringArg,
	hasFlag,
	loadSimulationConfig,
} from "@barsim/core";
import {
	CcxtMarketDataClient,
	type MarketDataClient,
	type MarketDataStream,
	PollingBarStream,
} from "@barsim/data";
import { type LivePaperHandle, startLivePaper } from "@barsim/runtime";
import { createStrategy } from "@barsim/strategy-engine";

const logger = createLogger("trader-cli");

const DEFAULT_WARMUP_BARS = 200;

export interface LiveCommandOptions extends ConfigLoadOptions {
	symbol?: string;
	timeframe?: string;
	exchangeId?: string;
	initialCash?: number;
	/** Skip the exchange and trade synthetic bars only. */
	synthetic: boolean;
	/** Bars fetched for `strategy.fit` before the stream starts. */
	warmup: number;
	durationMs?: number;
}

export interface LiveCommandDeps {
	client?: MarketDataClient;
	stream?: MarketDataStream;
	signal?: AbortSignal;
}

export const resolveLiveOptions = (flags: Record<string, ArgValue>): LiveCommandOptions => {
	const warmup = getNumberArg(flags, "warmup") ?? DEFAULT_WARMUP_BARS;
	if (!Number.isInteger(warmup) || warmup < 0) {
		throw new Error(`--warmup must be a non-negative integer, got ${warmup}`);
	}
	const durationSec = getNumberArg(flags, "duration");
	if (durationSec !== undefined && durationSec <= 0) {
		throw new Error(`--duration must be positive, got ${durationSec}`);
	}
	return {
		symbol: getStringArg(flags, "symbol"),
		timeframe: getStringArg(flags, "timeframe"),
		exchangeId: getStringArg(flags, "exchange"),
		initialCash: getNumberArg(flags, "initialCash"),
		synthetic: hasFlag(flags, "synthetic"),
		warmup,
		durationMs: durationSec === undefined ? undefined : durationSec * 1000,
		envPath: getStringArg(flags, "envPath"),
		configDir: getStringArg(flags, "configDir"),
		riskProfile: getStringArg(flags, "riskProfile"),
		accountProfile: getStringArg(flags, "accountProfile"),
		engineProfile: getStringArg(flags, "engineProfile"),
		liveProfile: getStringArg(flags, "liveProfile"),
		strategyProfile: getStringArg(flags, "strategyProfile"),
	};
};

const fetchWarmup = async (
	client: MarketDataClient,
	symbol: string,
	timeframe: string,
	limit: number
): Promise<Bar[]> => {
	try {
		// The newest row is the still-forming bar.
		const bars = await client.fetchOHLCV(symbol, timeframe, limit + 1);
		return bars.slice(0, -1).slice(-limit);
	} catch (error) {
		logger.warn("warmup_fetch_failed", {
			symbol,
			timeframe,
			message: error instanceof Error ? error.message : String(error),
		});
		return [];
	}
};

/**
 * Wires config, market data and strategy into a running paper session. The
 * session runs until the returned handle is stopped or `deps.signal` aborts.
 */
export const startLiveCommand = async (
	options: LiveCommandOptions,
	deps: LiveCommandDeps = {}
): Promise<LivePaperHandle> => {
	const config = loadSimulationConfig(options);
	const live = config.live;
	const symbol = options.symbol ?? live.symbol;
	const timeframe = options.timeframe ?? live.timeframe;
	const exchangeId = options.exchangeId ?? live.exchangeId;
	const strategy = createStrategy(config.strategy);

	const client = options.synthetic
		? null
		: deps.client ?? CcxtMarketDataClient.create(exchangeId);
	const history =
		client && options.warmup > 0
			? await fetchWarmup(client, symbol, timeframe, options.warmup)
			: [];

	const stream =
		deps.stream ??
		new PollingBarStream(client, {
			symbol,
			timeframe,
			pollIntervalMs: live.pollIntervalMs,
			reconnectDelayMs: live.reconnectDelayMs,
			maxReconnectAttempts: live.maxReconnectAttempts,
			syntheticFallback: options.synthetic || live.syntheticFallback,
			startAfter: history[history.length - 1]?.timestamp,
		});

	logger.info("cli_starting", {
		symbol,
		timeframe,
		exchangeId: client ? exchangeId : null,
		strategy: strategy.name,
		warmupBars: history.length,
		synthetic: options.synthetic,
	});

	return startLivePaper(
		{
			symbol,
			initialCash: options.initialCash ?? config.account.startingBalance,
			sizingFraction: config.engine.sizingFraction,
			risk: config.risk,
			sizingBasis: config.engine.sizingBasis,
			oversellPolicy: config.engine.oversellPolicy,
			feeRate: live.feeRate,
			latencyMs: live.latencyMs,
			queueCapacity: live.queueCapacity,
		},
		{
			stream,
			strategy,
			history,
			signal: deps.signal,
		}
	);
};
