export * from "./types";
export { PollingBarStream } from "./pollingBarStream";
export type { PollingBarStreamDeps } from "./pollingBarStream";
export { SyntheticBarGenerator } from "./syntheticBars";
export type { SyntheticBarOptions } from "./syntheticBars";
export { CcxtMarketDataClient, supportedExchangeIds } from "./ccxtClient";
export { fetchHistoricalBars, sortBars } from "./historical";
export {
	CSV_COLUMNS,
	formatBarsCsv,
	loadBarsFromCsv,
	parseBarsCsv,
	saveBarsToCsv,
} from "./csvBars";
export type { CsvBarMeta } from "./csvBars";
export { mapCcxtOhlcvToBar } from "./utils/ccxtMapper";
