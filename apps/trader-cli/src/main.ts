#!/usr/bin/env node

import process from "node:process";
import { createLogger, hasFlag, parseCliArgs } from "@barsim/core";
import { summarizeEquityCurve } from "@barsim/metrics";
import { resolveLiveOptions, startLiveCommand } from "./liveCommand";

const logger = createLogger("trader-cli");

const USAGE = `Usage:
  npm run live-paper -- [options]

Runs a paper-trading session against polled exchange bars until SIGINT/SIGTERM.

Options (all optional):
  --symbol <symbol>        Trading pair (defaults to the live profile)
  --timeframe <tf>         Bar timeframe (defaults to the live profile)
  --exchange <id>          ccxt exchange id (defaults to the live profile)
  --synthetic              Trade synthetic bars; no exchange connection
  --warmup <n>             History bars fetched to fit the strategy (default 200)
  --duration <seconds>     Stop on its own after this long
  --initialCash <usd>      Override the account starting balance
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --accountProfile <id>    Account profile name
  --engineProfile <id>     Engine profile name
  --liveProfile <id>       Live profile name
  --riskProfile <id>       Risk profile name
  --strategyProfile <id>   Strategy profile name
  --help                   Show this message
`;

const main = async (): Promise<void> => {
	const { flags } = parseCliArgs(process.argv.slice(2));
	if (hasFlag(flags, "help")) {
		console.log(USAGE);
		return;
	}

	const options = resolveLiveOptions(flags);
	const controller = new AbortController();
	const onSignal = (signal: NodeJS.Signals): void => {
		logger.info("cli_signal_received", { signal });
		controller.abort();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
	const timer =
		options.durationMs === undefined
			? null
			: setTimeout(() => controller.abort(), options.durationMs);

	try {
		const handle = await startLiveCommand(options, { signal: controller.signal });
		const state = await handle.finished;
		const summary = summarizeEquityCurve(state.portfolio.equityCurve);
		console.log("---- Session ----");
		console.log(`Bars processed: ${summary.bars}`);
		console.log(`Trades executed: ${state.trades.length}`);
		console.log(`Final cash: $${state.portfolio.cash.toFixed(2)}`);
		console.log(`Final equity: $${summary.finalEquity.toFixed(2)}`);
		console.log(`Total return: ${(summary.totalReturnPct * 100).toFixed(2)}%`);
		console.log(`Risk state: ${handle.riskManager.state}`);
	} finally {
		if (timer) {
			clearTimeout(timer);
		}
		process.off("SIGINT", onSignal);
		process.off("SIGTERM", onSignal);
	}
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
