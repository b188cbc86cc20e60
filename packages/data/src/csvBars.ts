import fs from "node:fs";
import path from "node:path";
import { type Bar, createLogger, parseTimestamp } from "@barsim/core";
import { sortBars } from "./historical";

const csvLogger = createLogger("data:csv");

export const CSV_COLUMNS = [
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

export interface CsvBarMeta {
	symbol: string;
	timeframe: string;
}

type CsvColumn = (typeof CSV_COLUMNS)[number];

const parseNumber = (raw: string | undefined, column: CsvColumn, line: number): number => {
	const value = Number(raw?.trim());
	if (raw === undefined || raw.trim() === "" || !Number.isFinite(value)) {
		throw new Error(`Invalid ${column} on CSV line ${line}: "${raw ?? ""}"`);
	}
	return value;
};

/**
 * Parses `timestamp,open,high,low,close,volume` rows (header required, column
 * order free, extra columns ignored). Timestamps may be epoch ms or ISO-8601.
 * Rows come back sorted ascending; a repeated timestamp is an error.
 */
export const parseBarsCsv = (text: string, meta: CsvBarMeta): Bar[] => {
	const lines = text.split(/\r?\n/);
	const header = (lines[0] ?? "").split(",").map((cell) => cell.trim().toLowerCase());
	const columnIndex = (column: CsvColumn): number => {
		const position = header.indexOf(column);
		if (position < 0) {
			throw new Error(`CSV header is missing the "${column}" column`);
		}
		return position;
	};
	const index: Record<CsvColumn, number> = {
		timestamp: columnIndex("timestamp"),
		open: columnIndex("open"),
		high: columnIndex("high"),
		low: columnIndex("low"),
		close: columnIndex("close"),
		volume: columnIndex("volume"),
	};

	const bars: Bar[] = [];
	for (let i = 1; i < lines.length; i += 1) {
		const line = lines[i]?.trim();
		if (!line) {
			continue;
		}
		const cells = line.split(",");
		const lineNo = i + 1;
		const rawTimestamp = cells[index.timestamp];
		if (rawTimestamp === undefined) {
			throw new Error(`Missing timestamp on CSV line ${lineNo}`);
		}
		bars.push({
			symbol: meta.symbol,
			timeframe: meta.timeframe,
			timestamp: parseTimestamp(rawTimestamp),
			open: parseNumber(cells[index.open], "open", lineNo),
			high: parseNumber(cells[index.high], "high", lineNo),
			low: parseNumber(cells[index.low], "low", lineNo),
			close: parseNumber(cells[index.close], "close", lineNo),
			volume: parseNumber(cells[index.volume], "volume", lineNo),
		});
	}

	const sorted = sortBars(bars);
	for (let i = 1; i < sorted.length; i += 1) {
		const current = sorted[i];
		if (current && current.timestamp === sorted[i - 1]?.timestamp) {
			throw new Error(`Duplicate bar timestamp ${current.timestamp} in CSV`);
		}
	}
	return sorted;
};

export const loadBarsFromCsv = (filePath: string, meta: CsvBarMeta): Bar[] => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Bar file not found: ${filePath}`);
	}
	const bars = parseBarsCsv(fs.readFileSync(filePath, "utf-8"), meta);
	csvLogger.info("csv_bars_loaded", {
		file: filePath,
		symbol: meta.symbol,
		bars: bars.length,
	});
	return bars;
};

export const formatBarsCsv = (bars: Bar[]): string => {
	const rows = bars.map((bar) =>
		CSV_COLUMNS.map((column) => String(bar[column])).join(",")
	);
	return `${[CSV_COLUMNS.join(","), ...rows].join("\n")}\n`;
};

export const saveBarsToCsv = (filePath: string, bars: Bar[]): void => {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, formatBarsCsv(bars), "utf-8");
	csvLogger.info("csv_bars_saved", { file: filePath, bars: bars.length });
};
