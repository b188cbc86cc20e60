import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { formatBarsCsv, loadBarsFromCsv, parseBarsCsv, saveBarsToCsv } from "./csvBars";

const meta = { symbol: "BTC/USDT", timeframe: "1m" };

describe("parseBarsCsv", () => {
	it("parses epoch and ISO timestamps and sorts ascending", () => {
		const text = [
			"timestamp,open,high,low,close,volume",
			"1970-01-01T00:02:00.000Z,102,103,101,102.5,7",
			"60000,101,102,100,101.5,5",
			"",
		].join("\n");

		expect(parseBarsCsv(text, meta)).toEqual([
			{ ...meta, timestamp: 60_000, open: 101, high: 102, low: 100, close: 101.5, volume: 5 },
			{ ...meta, timestamp: 120_000, open: 102, high: 103, low: 101, close: 102.5, volume: 7 },
		]);
	});

	it("accepts columns in any order", () => {
		const text = "close,volume,timestamp,open,low,high\r\n10,1,0,9,8,11\r\n";
		expect(parseBarsCsv(text, meta)[0]).toMatchObject({
			timestamp: 0,
			open: 9,
			high: 11,
			low: 8,
			close: 10,
		});
	});

	it("names a missing column", () => {
		expect(() => parseBarsCsv("timestamp,open,high,low,close\n", meta)).toThrowError(
			'CSV header is missing the "volume" column'
		);
	});

	it("names the offending line for a bad number", () => {
		const text = "timestamp,open,high,low,close,volume\n0,1,2,0.5,abc,3\n";
		expect(() => parseBarsCsv(text, meta)).toThrowError(
			'Invalid close on CSV line 2: "abc"'
		);
	});

	it("rejects duplicate timestamps", () => {
		const text = "timestamp,open,high,low,close,volume\n0,1,1,1,1,1\n0,2,2,2,2,2\n";
		expect(() => parseBarsCsv(text, meta)).toThrowError(
			"Duplicate bar timestamp 0 in CSV"
		);
	});
});

describe("CSV files", () => {
	it("writes bars that load back unchanged", () => {
		const bars = [
			{ ...meta, timestamp: 0, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 },
			{ ...meta, timestamp: 60_000, open: 1.5, high: 1.75, low: 1.25, close: 1.25, volume: 4 },
		];
		expect(formatBarsCsv(bars)).toBe(
			"timestamp,open,high,low,close,volume\n0,1,2,0.5,1.5,10\n60000,1.5,1.75,1.25,1.25,4\n"
		);

		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "barsim-csv-"));
		const file = path.join(dir, "nested", "bars.csv");
		saveBarsToCsv(file, bars);
		expect(loadBarsFromCsv(file, meta)).toEqual(bars);
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("reports a missing file", () => {
		expect(() => loadBarsFromCsv("/nonexistent/bars.csv", meta)).toThrowError(
			"Bar file not found: /nonexistent/bars.csv"
		);
	});
});
