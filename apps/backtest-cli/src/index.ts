#!/usr/bin/env node

import process from "node:process";
import { hasFlag, parseCliArgs } from "@barsim/core";
import {
	type BacktestReport,
	resolveBacktestOptions,
	runBacktestCommand,
	writeBacktestOutputs,
} from "./backtestCommand";

const USAGE = `Usage:
  npm run backtest -- --bars <csv> [options]
  npm run backtest -- --exchange <id> --start <iso|ms> --end <iso|ms> [options]

Options (all optional unless noted):
  --bars <path>            CSV of timestamp,open,high,low,close,volume (or first positional)
  --exchange <id>          Fetch bars over ccxt instead of reading a file
  --start <iso|ms>         First bar to fetch (required with --exchange)
  --end <iso|ms>           Last bar to fetch (required with --exchange)
  --saveBars <path>        Write fetched bars to a CSV for later replays
  --symbol <symbol>        Trading pair (defaults to the live profile)
  --timeframe <tf>         Bar timeframe (defaults to the live profile)
  --warmup <n>             Fit the strategy on the first n bars instead of trading them
  --initialCash <usd>      Override the account starting balance
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --accountProfile <id>    Account profile name
  --engineProfile <id>     Engine profile name
  --liveProfile <id>       Live profile name (symbol/timeframe/exchange defaults)
  --riskProfile <id>       Risk profile name
  --strategyProfile <id>   Strategy profile name
  --out <dir>              Save the JSON report plus equity and trade CSVs
  --json                   Print the full JSON report
  --help                   Show this message
`;

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

const formatPct = (value: number): string => `${(value * 100).toFixed(2)}%`;

const printSummary = (report: BacktestReport): void => {
	const { summary, result } = report;
	console.log("---- Summary ----");
	console.log(`Source: ${report.source}`);
	console.log(`Strategy: ${report.strategyId} on ${report.symbol} ${report.timeframe}`);
	console.log(`Bars replayed: ${result.barsProcessed} (warmup ${report.warmupBars})`);
	console.log(`Trades executed: ${result.trades.length}`);
	console.log(`Starting equity: ${formatUsd(summary.startEquity)}`);
	console.log(`Final equity: ${formatUsd(summary.finalEquity)}`);
	console.log(`Total return: ${formatPct(summary.totalReturnPct)}`);
	console.log(`Max drawdown: ${formatPct(summary.maxDrawdownPct)}`);
	console.log(`Sharpe: ${summary.sharpe.toFixed(3)}  Sortino: ${summary.sortino.toFixed(3)}`);
	console.log(`Risk state: ${result.riskState}`);
};

const main = async (): Promise<void> => {
	const { flags, positionals } = parseCliArgs(process.argv.slice(2));
	if (hasFlag(flags, "help")) {
		console.log(USAGE);
		return;
	}

	const options = resolveBacktestOptions(flags, positionals);
	const report = await runBacktestCommand(options);

	if (hasFlag(flags, "json")) {
		console.log(JSON.stringify(report, null, 2));
	} else {
		printSummary(report);
	}

	const outDir = flags.out;
	if (typeof outDir === "string" && outDir.length) {
		const files = writeBacktestOutputs(report, outDir);
		console.log(`Backtest saved to ${files.json}`);
	}
};

main().catch((error) => {
	console.error("Backtest failed:", error instanceof Error ? error.message : error);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
