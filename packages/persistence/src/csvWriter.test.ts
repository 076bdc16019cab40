import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DECIMAL_NAN, Dec, StorageError, type Kline } from "@klinex/core";
import type { SummaryMetricsRow } from "@klinex/metrics";
import {
	seriesCsvPath,
	summaryCsvPath,
	writeSeriesCsv,
	writeSummaryCsv,
} from "./csvWriter";
import { formatDecimal, formatKlinesCsv, formatSummaryCsv } from "./formatCsv";

const JAN_1_2024 = 1_704_067_200_000;

const kline = (openTime: number, volume = "12.5"): Kline => ({
	openTime,
	open: new Dec("42000.5"),
	high: new Dec("42100"),
	low: new Dec("41950.25"),
	close: new Dec("42050.12345678"),
	volume: new Dec(volume),
	closeTime: openTime + 3_599_999,
	quoteVolume: new Dec("525000.75"),
	trades: 1234,
	takerBuyBaseVolume: new Dec("6"),
	takerBuyQuoteVolume: new Dec("252000"),
});

const KLINE_HEADER =
	"open_time_utc,open,high,low,close,volume,close_time_utc,quote_volume,trades,taker_buy_base_volume,taker_buy_quote_volume";

describe("formatDecimal", () => {
	it("rounds half-up to a fixed width", () => {
		expect(formatDecimal(new Dec("0.12345678905"), 10)).toBe("0.1234567891");
		expect(formatDecimal(new Dec("2.5"), 0)).toBe("3");
		expect(formatDecimal(new Dec("7"), 6)).toBe("7.000000");
	});

	it("renders NaN literally", () => {
		expect(formatDecimal(DECIMAL_NAN, 6)).toBe("NaN");
	});
});

describe("formatKlinesCsv", () => {
	it("writes the header and one line per kline", () => {
		expect(formatKlinesCsv([kline(JAN_1_2024)])).toBe(
			`${KLINE_HEADER}\n` +
				"2024-01-01 00:00:00,42000.5000000000,42100.0000000000,41950.2500000000,42050.1234567800," +
				"12.5000000000,2024-01-01 00:59:59,525000.7500000000,1234,6.0000000000,252000.0000000000\n"
		);
	});

	it("writes only the header for an empty series", () => {
		expect(formatKlinesCsv([])).toBe(`${KLINE_HEADER}\n`);
	});
});

describe("formatSummaryCsv", () => {
	it("uses six digits for percentages and ten for volumes", () => {
		const row: SummaryMetricsRow = {
			symbol: "BTCUSDT",
			priceChange90dPct: new Dec("12.3456789"),
			priceChange180dPct: new Dec("-4.5"),
			avgDailyVolumeBase: new Dec("3600"),
			avgDailyVolumeQuote: DECIMAL_NAN,
		};

		expect(formatSummaryCsv([row])).toBe(
			"symbol,price_change_90d_pct,price_change_180d_pct,avg_daily_volume_base,avg_daily_volume_quote\n" +
				"BTCUSDT,12.345679,-4.500000,3600.0000000000,NaN\n"
		);
	});
});

describe("csv writers", () => {
	let workDir: string;

	beforeEach(() => {
		workDir = fs.mkdtempSync(path.join(os.tmpdir(), "klines-csv-"));
	});

	afterEach(() => {
		fs.rmSync(workDir, { recursive: true, force: true });
	});

	it("writes a series that reads back with the same rows", () => {
		const series = [kline(JAN_1_2024), kline(JAN_1_2024 + 3_600_000, "0.00000001")];
		const filePath = path.join(workDir, "BTCUSDT_1h.csv");

		expect(writeSeriesCsv(filePath, series)).toBe(2);

		const lines = fs.readFileSync(filePath, "utf-8").trimEnd().split("\n");
		expect(lines).toHaveLength(3);
		expect(lines[0]).toBe(KLINE_HEADER);
		expect(lines[2].split(",")[5]).toBe("0.0000000100");
		expect(lines[2].split(",")[0]).toBe("2024-01-01 01:00:00");
	});

	it("replaces an existing file", () => {
		const filePath = path.join(workDir, "ETHUSDT_4h.csv");
		writeSeriesCsv(filePath, [kline(JAN_1_2024), kline(JAN_1_2024 + 3_600_000)]);
		writeSeriesCsv(filePath, []);

		expect(fs.readFileSync(filePath, "utf-8")).toBe(`${KLINE_HEADER}\n`);
	});

	it("fails with StorageError when the directory is missing", () => {
		const filePath = path.join(workDir, "missing", "BTCUSDT_1h.csv");

		expect(() => writeSeriesCsv(filePath, [kline(JAN_1_2024)])).toThrow(StorageError);
		expect(() => writeSummaryCsv(filePath, [])).toThrow(/does not exist/);
		expect(fs.existsSync(path.join(workDir, "missing"))).toBe(false);
	});

	it("reports the path on failure", () => {
		const filePath = path.join(workDir, "nope", "summary_metrics.csv");

		try {
			writeSummaryCsv(filePath, []);
			expect.unreachable();
		} catch (error) {
			expect(error).toMatchObject({ code: "STORAGE_ERROR", path: filePath });
		}
	});

	it("writes summary rows in the given order", () => {
		const rows: SummaryMetricsRow[] = ["SOLUSDT", "BTCUSDT"].map((symbol) => ({
			symbol,
			priceChange90dPct: new Dec(1),
			priceChange180dPct: new Dec(2),
			avgDailyVolumeBase: new Dec(3),
			avgDailyVolumeQuote: new Dec(4),
		}));
		const filePath = summaryCsvPath(workDir);

		expect(writeSummaryCsv(filePath, rows)).toBe(2);
		const symbols = fs
			.readFileSync(filePath, "utf-8")
			.trimEnd()
			.split("\n")
			.slice(1)
			.map((line) => line.split(",")[0]);
		expect(symbols).toEqual(["SOLUSDT", "BTCUSDT"]);
	});
});

describe("output paths", () => {
	it("nests series files under a per-interval directory", () => {
		expect(seriesCsvPath("out", "BTCUSDT", "4h")).toBe(
			path.join("out", "klines_4h", "BTCUSDT_4h.csv")
		);
		expect(summaryCsvPath("out")).toBe(path.join("out", "summary_metrics.csv"));
	});
});
