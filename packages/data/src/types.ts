import type { Bar } from "@barsim/core";

export interface MarketDataClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Bar[]>;
	close?(): Promise<void>;
}

export type BarHandler = (bar: Bar) => void | Promise<void>;

/**
 * Push source of ascending bars. Transient upstream failures are absorbed by
 * the stream; handlers only ever see bars.
 */
export interface MarketDataStream {
	start(): void;
	stop(): Promise<void>;
	onBar(handler: BarHandler): () => void;
}

export interface PollingBarStreamOptions {
	symbol: string;
	timeframe: string;
	pollIntervalMs?: number;
	reconnectDelayMs?: number;
	maxReconnectAttempts?: number;
	syntheticFallback?: boolean;
	/** Bars at or before this timestamp are never emitted. */
	startAfter?: number;
}

export interface HistoricalRangeRequest {
	symbol: string;
	timeframe: string;
	startTimestamp: number;
	endTimestamp: number;
	batchSize?: number;
	maxIterations?: number;
}
