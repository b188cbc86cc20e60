import { type Bar, createLogger, timeframeToMs } from "@barsim/core";
import type { HistoricalRangeRequest, MarketDataClient } from "./types";

const historicalLogger = createLogger("data:historical");

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

/**
 * Pages through `client.fetchOHLCV` from `startTimestamp` until a bar past
 * `endTimestamp` arrives or the client runs dry. Duplicate timestamps across
 * pages are dropped; the result is ascending.
 */
export const fetchHistoricalBars = async (
	client: MarketDataClient,
	request: HistoricalRangeRequest
): Promise<Bar[]> => {
	if (request.endTimestamp < request.startTimestamp) {
		throw new Error(
			`Historical range end ${request.endTimestamp} precedes start ${request.startTimestamp}`
		);
	}
	const batchSize = Math.max(request.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		request.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(request.timeframe);

	const result: Bar[] = [];
	const seenTimestamps = new Set<number>();
	let since = request.startTimestamp;
	let iterations = 0;

	while (since <= request.endTimestamp && iterations < maxIterations) {
		const batch = await client.fetchOHLCV(
			request.symbol,
			request.timeframe,
			batchSize,
			since
		);
		if (!batch.length) {
			break;
		}

		for (const bar of batch) {
			if (bar.timestamp > request.endTimestamp) {
				return sortBars(result);
			}
			if (bar.timestamp >= request.startTimestamp && !seenTimestamps.has(bar.timestamp)) {
				result.push(bar);
				seenTimestamps.add(bar.timestamp);
			}
		}

		const last = batch[batch.length - 1];
		if (!last) {
			break;
		}
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
		iterations += 1;
	}

	if (iterations >= maxIterations) {
		historicalLogger.warn("historical_fetch_iterations_exceeded", {
			symbol: request.symbol,
			timeframe: request.timeframe,
			iterations,
			maxIterations,
		});
	}

	historicalLogger.info("historical_bars_loaded", {
		symbol: request.symbol,
		timeframe: request.timeframe,
		bars: result.length,
	});
	return sortBars(result);
};

export const sortBars = (bars: Bar[]): Bar[] =>
	[...bars].sort((a, b) => a.timestamp - b.timestamp);
