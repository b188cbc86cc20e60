import fs from "node:fs";
import path from "node:path";
import {
	type ArgValue,
	type Bar,
	type ConfigLoadOptions,
	type SimulationConfig,
	createLogger,
	getNumberArg,
	getStringArg,
	loadSimulationConfig,
	parseTimestamp,
} from "@barsim/core";
import {
	CcxtMarketDataClient,
	type MarketDataClient,
	fetchHistoricalBars,
	loadBarsFromCsv,
	saveBarsToCsv,
} from "@barsim/data";
import {
	type EquitySummary,
	formatEquityCsv,
	formatTradesCsv,
	summarizeEquityCurve,
} from "@barsim/metrics";
import { type BacktestResult, runBacktest } from "@barsim/runtime";
import { createStrategy } from "@barsim/strategy-engine";

const logger = createLogger("backtest-cli");

export interface BacktestCommandOptions extends ConfigLoadOptions {
	barsPath?: string;
	exchangeId?: string;
	startTimestamp?: number;
	endTimestamp?: number;
	saveBarsPath?: string;
	symbol?: string;
	timeframe?: string;
	initialCash?: number;
	/** Leading bars handed to `strategy.fit` instead of being replayed. */
	warmup: number;
}

export interface BacktestCommandDeps {
	/** Replaces the ccxt client for `--exchange` runs. */
	client?: MarketDataClient;
}

export interface BacktestReport {
	symbol: string;
	timeframe: string;
	strategyId: string;
	source: string;
	warmupBars: number;
	summary: EquitySummary;
	result: BacktestResult;
}

const parseOptionalTimestamp = (
	flags: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = getStringArg(flags, key);
	return raw === undefined ? undefined : parseTimestamp(raw);
};

/** Maps parsed CLI flags onto command options; the first positional is a bar file. */
export const resolveBacktestOptions = (
	flags: Record<string, ArgValue>,
	positionals: string[] = []
): BacktestCommandOptions => {
	const warmup = getNumberArg(flags, "warmup") ?? 0;
	if (!Number.isInteger(warmup) || warmup < 0) {
		throw new Error(`--warmup must be a non-negative integer, got ${warmup}`);
	}
	return {
		barsPath: getStringArg(flags, "bars") ?? positionals[0],
		exchangeId: getStringArg(flags, "exchange"),
		startTimestamp: parseOptionalTimestamp(flags, "start"),
		endTimestamp: parseOptionalTimestamp(flags, "end"),
		saveBarsPath: getStringArg(flags, "saveBars"),
		symbol: getStringArg(flags, "symbol"),
		timeframe: getStringArg(flags, "timeframe"),
		initialCash: getNumberArg(flags, "initialCash"),
		warmup,
		envPath: getStringArg(flags, "envPath"),
		configDir: getStringArg(flags, "configDir"),
		riskProfile: getStringArg(flags, "riskProfile"),
		accountProfile: getStringArg(flags, "accountProfile"),
		engineProfile: getStringArg(flags, "engineProfile"),
		liveProfile: getStringArg(flags, "liveProfile"),
		strategyProfile: getStringArg(flags, "strategyProfile"),
	};
};

const fetchExchangeBars = async (
	options: BacktestCommandOptions,
	config: SimulationConfig,
	symbol: string,
	timeframe: string,
	deps: BacktestCommandDeps
): Promise<{ bars: Bar[]; source: string }> => {
	const { startTimestamp, endTimestamp } = options;
	if (startTimestamp === undefined || endTimestamp === undefined) {
		throw new Error("--exchange requires both --start and --end");
	}
	const exchangeId = options.exchangeId ?? config.live.exchangeId;
	const client = deps.client ?? CcxtMarketDataClient.create(exchangeId);
	try {
		const bars = await fetchHistoricalBars(client, {
			symbol,
			timeframe,
			startTimestamp,
			endTimestamp,
		});
		return { bars, source: `exchange:${exchangeId}` };
	} finally {
		await client.close?.();
	}
};

const loadBars = async (
	options: BacktestCommandOptions,
	config: SimulationConfig,
	symbol: string,
	timeframe: string,
	deps: BacktestCommandDeps
): Promise<{ bars: Bar[]; source: string }> => {
	if (options.barsPath) {
		const file = path.resolve(options.barsPath);
		return { bars: loadBarsFromCsv(file, { symbol, timeframe }), source: file };
	}
	if (options.exchangeId || deps.client) {
		const fetched = await fetchExchangeBars(options, config, symbol, timeframe, deps);
		if (options.saveBarsPath) {
			saveBarsToCsv(path.resolve(options.saveBarsPath), fetched.bars);
		}
		return fetched;
	}
	throw new Error("Provide --bars <csv> or --exchange <id> with --start and --end");
};

/**
 * Loads config and bars, warms the strategy on the first `warmup` bars and
 * replays the rest through the backtest engine.
 */
export const runBacktestCommand = async (
	options: BacktestCommandOptions,
	deps: BacktestCommandDeps = {}
): Promise<BacktestReport> => {
	const config = loadSimulationConfig(options);
	const symbol = options.symbol ?? config.live.symbol;
	const timeframe = options.timeframe ?? config.live.timeframe;
	const { bars, source } = await loadBars(options, config, symbol, timeframe, deps);

	if (options.warmup >= bars.length) {
		throw new Error(
			`--warmup (${options.warmup}) must leave at least one bar to replay; loaded ${bars.length}`
		);
	}

	const strategy = createStrategy(config.strategy);
	if (options.warmup > 0) {
		strategy.fit(bars.slice(0, options.warmup));
	}

	const result = runBacktest(bars.slice(options.warmup), strategy, {
		symbol,
		initialCash: options.initialCash ?? config.account.startingBalance,
		sizingFraction: config.engine.sizingFraction,
		risk: config.risk,
		sizingBasis: config.engine.sizingBasis,
		slippagePct: config.engine.slippagePct,
		slippageAbs: config.engine.slippageAbs,
		feeRate: config.engine.feeRate,
		oversellPolicy: config.engine.oversellPolicy,
	});
	const summary = summarizeEquityCurve(result.equityCurve);

	logger.info("backtest_summary", {
		symbol,
		timeframe,
		strategy: strategy.name,
		trades: result.trades.length,
		...summary,
		riskState: result.riskState,
	});

	return {
		symbol,
		timeframe,
		strategyId: config.strategy.id,
		source,
		warmupBars: options.warmup,
		summary,
		result,
	};
};

export interface BacktestOutputFiles {
	json: string;
	equityCsv: string;
	tradesCsv: string;
}

/** Writes the report as JSON plus equity and trade CSVs under `outDir`. */
export const writeBacktestOutputs = (
	report: BacktestReport,
	outDir: string,
	now: Date = new Date()
): BacktestOutputFiles => {
	const stamp = now.toISOString().replace(/[:.]/g, "-");
	const safeSymbol = report.symbol.replace(/[\\/]/g, "");
	const base = path.join(
		path.resolve(outDir),
		`${report.strategyId}-${safeSymbol}-${report.timeframe}-${stamp}`
	);
	fs.mkdirSync(path.dirname(base), { recursive: true });

	const files: BacktestOutputFiles = {
		json: `${base}.json`,
		equityCsv: `${base}-equity.csv`,
		tradesCsv: `${base}-trades.csv`,
	};
	fs.writeFileSync(files.json, JSON.stringify(report, null, 2));
	fs.writeFileSync(files.equityCsv, formatEquityCsv(report.result.equityCurve));
	fs.writeFileSync(files.tradesCsv, formatTradesCsv(report.result.trades));
	logger.info("backtest_saved", { ...files });
	return files;
};
