export interface DrawdownSpan {
	peakTimestamp: number;
	troughTimestamp: number;
	recoveryTimestamp: number | null;
	depth: number;
	depthPct: number;
	durationMs: number;
	recoveryMs: number | null;
}

export interface EquityCurveStats {
	newHighCount: number;
	averageRecoveryMs: number;
	longestRecoveryMs: number;
	volatility: number;
	meanReturn: number;
	returnSampleCount: number;
	maxEquity: number;
	minEquity: number;
}

/** Ratios (`totalReturnPct`, `maxDrawdownPct`, `hitRate`) are fractions. */
export interface EquitySummary {
	bars: number;
	startEquity: number;
	finalEquity: number;
	totalReturnPct: number;
	sharpe: number;
	sortino: number;
	hitRate: number;
	maxDrawdownPct: number;
	maxDrawdown: number;
}

export interface EquityReport {
	summary: EquitySummary;
	equityCurve: EquityCurveStats;
	drawdowns: DrawdownSpan[];
}

export interface SummaryOptions {
	/** Annual rate, converted per period. */
	riskFreeRate?: number;
	/** Defaults to the year divided by the curve's average spacing. */
	periodsPerYear?: number;
}
