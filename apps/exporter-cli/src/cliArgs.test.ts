import { describe, it, expect } from "vitest";
import { ConfigError } from "@klinex/core";
import { parseCliArgs, readFlag, readList, readString } from "./cliArgs";

describe("exporter CLI arg parsing", () => {
	it("collects several values after one flag", () => {
		const args = parseCliArgs(["--symbols", "BTCUSDT", "ETHUSDT", "--days", "30"]);
		expect(args.symbols).toEqual(["BTCUSDT", "ETHUSDT"]);
		expect(args.days).toBe("30");
	});

	it("captures equals syntax", () => {
		const args = parseCliArgs(["--intervals=1h,4h", "--out=data"]);
		expect(readList(args, "intervals")).toEqual(["1h", "4h"]);
		expect(readString(args, "out")).toBe("data");
	});

	it("merges repeated flags", () => {
		const args = parseCliArgs(["--symbols", "BTCUSDT", "--symbols=SOLUSDT"]);
		expect(args.symbols).toEqual(["BTCUSDT", "SOLUSDT"]);
	});

	it("treats a flag without a value as boolean", () => {
		const args = parseCliArgs(["--help", "--version"]);
		expect(readFlag(args, "help")).toBe(true);
		expect(readFlag(args, "version")).toBe(true);
		expect(readFlag(args, "json")).toBe(false);
	});

	it("takes leading positionals as symbols", () => {
		const args = parseCliArgs(["btcusdt", "ethusdt", "--days", "7"]);
		expect(args.symbols).toEqual(["btcusdt", "ethusdt"]);
	});

	it("splits list values on commas and spaces", () => {
		const args = parseCliArgs(["--symbols", "BTCUSDT,ETHUSDT", "SOLUSDT XRPUSDT"]);
		expect(readList(args, "symbols")).toEqual(["BTCUSDT", "ETHUSDT", "SOLUSDT", "XRPUSDT"]);
	});

	it("rejects a single-value option given twice", () => {
		const args = parseCliArgs(["--days", "7", "30"]);
		expect(() => readString(args, "days")).toThrow(ConfigError);
	});

	it("rejects an option missing its value", () => {
		const args = parseCliArgs(["--out", "--days", "7"]);
		expect(() => readString(args, "out")).toThrow("--out requires a value");
		expect(() => readList(parseCliArgs(["--symbols"]), "symbols")).toThrow(ConfigError);
	});
});
