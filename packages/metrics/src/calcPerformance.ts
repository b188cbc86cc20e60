import type { EquityPoint } from "@barsim/core";
import type {
	DrawdownSpan,
	EquityCurveStats,
	EquityReport,
	EquitySummary,
	SummaryOptions,
} from "./metricsSchema";

const MS_IN_YEAR = 365 * 86_400_000;

interface OpenDrawdown {
	peakTimestamp: number;
	peakEquity: number;
	troughTimestamp: number;
	troughEquity: number;
}

export const summarizeEquityCurve = (
	curve: readonly EquityPoint[],
	options: SummaryOptions = {}
): EquitySummary => analyzeEquityCurve(curve, options).summary;

export const analyzeEquityCurve = (
	curve: readonly EquityPoint[],
	options: SummaryOptions = {}
): EquityReport => {
	const first = curve[0];
	const last = curve[curve.length - 1];
	if (!first || !last) {
		return emptyReport();
	}

	const returns: number[] = [];
	const drawdowns: DrawdownSpan[] = [];
	let peakEquity = first.equity;
	let peakTimestamp = first.timestamp;
	let maxDrawdown = 0;
	let maxDrawdownPct = 0;
	let newHighCount = 1;
	let activeSpan: OpenDrawdown | null = null;

	for (let i = 1; i < curve.length; i += 1) {
		const prev = curve[i - 1];
		const point = curve[i];
		if (!prev || !point) {
			continue;
		}
		returns.push((point.equity - prev.equity) / Math.max(prev.equity, 1));

		if (point.equity > peakEquity) {
			if (activeSpan) {
				drawdowns.push(closeDrawdown(activeSpan, point.timestamp));
				activeSpan = null;
			}
			peakEquity = point.equity;
			peakTimestamp = point.timestamp;
			newHighCount += 1;
			continue;
		}

		if (!activeSpan) {
			activeSpan = {
				peakTimestamp,
				peakEquity,
				troughTimestamp: point.timestamp,
				troughEquity: point.equity,
			};
		} else if (point.equity < activeSpan.troughEquity) {
			activeSpan.troughEquity = point.equity;
			activeSpan.troughTimestamp = point.timestamp;
		}

		const depth = peakEquity - point.equity;
		maxDrawdown = Math.max(maxDrawdown, depth);
		if (peakEquity > 0) {
			maxDrawdownPct = Math.max(maxDrawdownPct, depth / peakEquity);
		}
	}

	if (activeSpan) {
		drawdowns.push(closeDrawdown(activeSpan, null));
	}

	const periods =
		options.periodsPerYear ?? inferPeriodsPerYear(first.timestamp, last.timestamp, curve.length);
	const riskFreeRate = options.riskFreeRate ?? 0;
	const recoveryDurations = drawdowns
		.map((span) => span.recoveryMs)
		.filter((value): value is number => typeof value === "number");

	const equityCurve: EquityCurveStats = {
		newHighCount,
		averageRecoveryMs: recoveryDurations.length
			? mean(recoveryDurations)
			: 0,
		longestRecoveryMs: recoveryDurations.length
			? recoveryDurations.reduce((longest, value) => Math.max(longest, value), 0)
			: 0,
		volatility: standardDeviation(returns),
		meanReturn: returns.length ? mean(returns) : 0,
		returnSampleCount: returns.length,
		maxEquity: curve.reduce((max, point) => Math.max(max, point.equity), first.equity),
		minEquity: curve.reduce((min, point) => Math.min(min, point.equity), first.equity),
	};

	return {
		summary: {
			bars: curve.length,
			startEquity: first.equity,
			finalEquity: last.equity,
			totalReturnPct:
				first.equity > 0 ? (last.equity - first.equity) / first.equity : 0,
			sharpe: computeSharpe(returns, riskFreeRate, periods),
			sortino: computeSortino(returns, riskFreeRate, periods),
			hitRate: returns.length
				? returns.filter((value) => value > 0).length / returns.length
				: 0,
			maxDrawdownPct,
			maxDrawdown,
		},
		equityCurve,
		drawdowns,
	};
};

const emptyReport = (): EquityReport => ({
	summary: {
		bars: 0,
		startEquity: 0,
		finalEquity: 0,
		totalReturnPct: 0,
		sharpe: 0,
		sortino: 0,
		hitRate: 0,
		maxDrawdownPct: 0,
		maxDrawdown: 0,
	},
	equityCurve: {
		newHighCount: 0,
		averageRecoveryMs: 0,
		longestRecoveryMs: 0,
		volatility: 0,
		meanReturn: 0,
		returnSampleCount: 0,
		maxEquity: 0,
		minEquity: 0,
	},
	drawdowns: [],
});

const closeDrawdown = (
	span: OpenDrawdown,
	recoveryTimestamp: number | null
): DrawdownSpan => {
	const depth = span.peakEquity - span.troughEquity;
	return {
		peakTimestamp: span.peakTimestamp,
		troughTimestamp: span.troughTimestamp,
		recoveryTimestamp,
		depth,
		depthPct: span.peakEquity > 0 ? depth / span.peakEquity : 0,
		durationMs: span.troughTimestamp - span.peakTimestamp,
		recoveryMs:
			recoveryTimestamp !== null
				? recoveryTimestamp - span.peakTimestamp
				: null,
	};
};

const inferPeriodsPerYear = (
	startTimestamp: number,
	endTimestamp: number,
	points: number
): number => {
	if (points < 2 || endTimestamp <= startTimestamp) {
		return 0;
	}
	return MS_IN_YEAR / ((endTimestamp - startTimestamp) / (points - 1));
};

const mean = (values: number[]): number =>
	values.reduce((sum, value) => sum + value, 0) / values.length;

const computeSharpe = (
	returns: number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const excess = mean(returns) - rfPerPeriod;
	const std = standardDeviation(returns);
	return std === 0 ? 0 : (excess / std) * Math.sqrt(periodsPerYear);
};

const computeSortino = (
	returns: number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const downside = returns.filter((value) => value < rfPerPeriod);
	if (!downside.length) {
		return 0;
	}
	const excess = mean(returns) - rfPerPeriod;
	const downsideDeviation = Math.sqrt(
		downside.reduce((sum, value) => sum + (value - rfPerPeriod) ** 2, 0) /
			downside.length
	);
	return downsideDeviation === 0
		? 0
		: (excess / downsideDeviation) * Math.sqrt(periodsPerYear);
};

const standardDeviation = (values: number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const avg = mean(values);
	const variance =
		values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
	return Math.sqrt(variance);
};
