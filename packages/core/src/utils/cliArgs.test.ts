import { describe, expect, it } from "vitest";
import { getNumberArg, getStringArg, hasFlag, parseCliArgs } from "./cliArgs";

describe("CLI arg parsing", () => {
	it("captures a flag followed by its value", () => {
		const { flags } = parseCliArgs(["--bars", "data/btc.csv", "--warmup", "50"]);
		expect(flags).toEqual({ bars: "data/btc.csv", warmup: "50" });
	});

	it("captures equals syntax", () => {
		const { flags } = parseCliArgs(["--symbol=ETH/USDT"]);
		expect(getStringArg(flags, "symbol")).toBe("ETH/USDT");
	});

	it("treats a flag without a value as true", () => {
		const { flags } = parseCliArgs(["--json", "--symbol", "BTC/USDT"]);
		expect(flags.json).toBe(true);
		expect(hasFlag(flags, "json")).toBe(true);
		expect(hasFlag(flags, "help")).toBe(false);
	});

	it("collects positionals in order", () => {
		const { positionals, flags } = parseCliArgs(["a.csv", "--json", "--out", "out", "b.csv"]);
		expect(positionals).toEqual(["a.csv", "b.csv"]);
		expect(flags.out).toBe("out");
	});

	it("parses numeric values", () => {
		const { flags } = parseCliArgs(["--initialCash", "2500.5"]);
		expect(getNumberArg(flags, "initialCash")).toBe(2500.5);
		expect(getNumberArg(flags, "warmup")).toBeUndefined();
	});

	it("rejects a non-numeric value", () => {
		const { flags } = parseCliArgs(["--warmup", "ten"]);
		expect(() => getNumberArg(flags, "warmup")).toThrowError(
			"Invalid numeric value for --warmup: ten"
		);
	});

	it("rejects a numeric flag given without a value", () => {
		const { flags } = parseCliArgs(["--warmup"]);
		expect(() => getNumberArg(flags, "warmup")).toThrowError("Missing value for --warmup");
	});
});
