import { describe, expect, it } from "vitest";
import type { Bar } from "@barsim/core";
import { fetchHistoricalBars } from "./historical";
import type { MarketDataClient } from "./types";

const buildBars = (count: number, start = 0): Bar[] =>
	Array.from({ length: count }, (_, idx) => ({
		symbol: "BTC/USDT",
		timeframe: "1m",
		timestamp: start + idx * 60_000,
		open: 100 + idx,
		high: 101 + idx,
		low: 99 + idx,
		close: 100 + idx,
		volume: 1_000 + idx,
	}));

class StaticMarketDataClient implements MarketDataClient {
	public calls: Array<{ limit?: number; since?: number }> = [];

	constructor(private readonly bars: Bar[]) {}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since = 0
	): Promise<Bar[]> {
		this.calls.push({ limit, since });
		return this.bars
			.filter((bar) => bar.symbol === symbol && bar.timeframe === timeframe)
			.filter((bar) => bar.timestamp >= since)
			.slice(0, limit);
	}
}

describe("fetchHistoricalBars", () => {
	it("pages until the end of the range", async () => {
		const client = new StaticMarketDataClient(buildBars(10));
		const bars = await fetchHistoricalBars(client, {
			symbol: "BTC/USDT",
			timeframe: "1m",
			startTimestamp: 60_000,
			endTimestamp: 6 * 60_000,
			batchSize: 2,
		});

		expect(bars.map((bar) => bar.timestamp / 60_000)).toEqual([1, 2, 3, 4, 5, 6]);
		expect(client.calls.map((call) => call.since)).toEqual([
			60_000,
			180_000,
			300_000,
		]);
	});

	it("stops when the client runs dry", async () => {
		const client = new StaticMarketDataClient(buildBars(3));
		const bars = await fetchHistoricalBars(client, {
			symbol: "BTC/USDT",
			timeframe: "1m",
			startTimestamp: 0,
			endTimestamp: 3_600_000,
			batchSize: 5,
		});
		expect(bars).toHaveLength(3);
		expect(client.calls).toHaveLength(2);
	});

	it("rejects an inverted range", async () => {
		const client = new StaticMarketDataClient([]);
		await expect(
			fetchHistoricalBars(client, {
				symbol: "BTC/USDT",
				timeframe: "1m",
				startTimestamp: 10,
				endTimestamp: 0,
			})
		).rejects.toThrowError("Historical range end 0 precedes start 10");
	});
});
