import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import { type Bar, createLogger } from "@barsim/core";
import type { MarketDataClient } from "./types";
import { mapCcxtOhlcvToBar } from "./utils/ccxtMapper";

const ccxtLogger = createLogger("data:ccxt");

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange;

const EXCHANGES: Record<string, ExchangeConstructor> = {
	binance: ccxt.binance,
	bybit: ccxt.bybit,
	coinbase: ccxt.coinbase,
	kraken: ccxt.kraken,
	mexc: ccxt.mexc,
	okx: ccxt.okx,
};

export const supportedExchangeIds = (): string[] => Object.keys(EXCHANGES);

/** Public-endpoint OHLCV reader; no credentials are configured. */
export class CcxtMarketDataClient implements MarketDataClient {
	private constructor(
		readonly exchangeId: string,
		private readonly exchange: Exchange
	) {}

	static create(exchangeId: string): CcxtMarketDataClient {
		const Ctor = EXCHANGES[exchangeId];
		if (!Ctor) {
			throw new Error(
				`Unsupported exchange "${exchangeId}". Supported: ${supportedExchangeIds().join(", ")}`
			);
		}
		return new CcxtMarketDataClient(
			exchangeId,
			new Ctor({ enableRateLimit: true, options: { defaultType: "spot" } })
		);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 200,
		since?: number
	): Promise<Bar[]> {
		const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		return rows.map((row) => mapCcxtOhlcvToBar(row, symbol, timeframe));
	}

	async close(): Promise<void> {
		await this.exchange.close();
		ccxtLogger.debug("exchange_closed", { exchangeId: this.exchangeId });
	}
}
