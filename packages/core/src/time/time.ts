/**
 * Pure time utilities. Everything operates on UTC epoch milliseconds.
 */

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Parse a timeframe string ("1m", "15m", "4h", "1d") to milliseconds.
 * @throws Error if the format is invalid or the period is not positive
 */
export const timeframeToMs = (timeframe: string): number => {
	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([mhd])$/);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (match[2]) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		default:
			return n * DAY_MS;
	}
};

/**
 * Bucket a timestamp to the start of its timeframe period.
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

/**
 * Accepts epoch milliseconds (as digits) or any string Date.parse understands.
 */
export const parseTimestamp = (value: string): number => {
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) {
		return Number(trimmed);
	}
	const parsed = Date.parse(trimmed);
	if (Number.isNaN(parsed)) {
		throw new Error(`Invalid timestamp: "${value}"`);
	}
	return parsed;
};
