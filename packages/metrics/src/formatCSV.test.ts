import { describe, expect, it } from "vitest";
import { formatEquityCsv, formatTradesCsv } from "./formatCSV";

describe("CSV export", () => {
	it("formats the equity curve", () => {
		expect(formatEquityCsv([{ timestamp: 0, equity: 1_000.5 }])).toBe(
			"timestamp,time,equity\n0,1970-01-01T00:00:00.000Z,1000.5"
		);
	});

	it("formats trades", () => {
		expect(
			formatTradesCsv([
				{
					orderId: "bt-000001",
					symbol: "BTC/USDT",
					side: "SELL",
					quantity: 2,
					price: 101.5,
					fee: 0,
					timestamp: 60_000,
				},
			])
		).toBe(
			"orderId,time,symbol,side,quantity,price,fee\nbt-000001,1970-01-01T00:01:00.000Z,BTC/USDT,SELL,2,101.5,0"
		);
	});

	it("returns an empty string without rows", () => {
		expect(formatTradesCsv([])).toBe("");
	});
});
