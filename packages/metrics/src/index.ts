export { analyzeEquityCurve, summarizeEquityCurve } from "./calcPerformance";
export { formatEquityCsv, formatTradesCsv } from "./formatCSV";
export type {
	DrawdownSpan,
	EquityCurveStats,
	EquityReport,
	EquitySummary,
	SummaryOptions,
} from "./metricsSchema";
