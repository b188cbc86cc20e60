import type { EquityPoint, Trade } from "@barsim/core";

export const formatEquityCsv = (curve: readonly EquityPoint[]): string =>
	toCsv(
		curve.map((point) => ({
			timestamp: point.timestamp,
			time: new Date(point.timestamp).toISOString(),
			equity: point.equity,
		}))
	);

export const formatTradesCsv = (trades: readonly Trade[]): string =>
	toCsv(
		trades.map((trade) => ({
			orderId: trade.orderId,
			time: new Date(trade.timestamp).toISOString(),
			symbol: trade.symbol,
			side: trade.side,
			quantity: trade.quantity,
			price: trade.price,
			fee: trade.fee,
		}))
	);

const toCsv = (rows: Record<string, unknown>[], includeHeader = true): string => {
	const firstRow = rows[0];
	if (!firstRow) {
		return "";
	}
	const headers = Object.keys(firstRow);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",")) {
			return `"${value}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
