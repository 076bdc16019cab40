import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	DAY_MS,
	DEFAULT_EXPORTER_CONFIG,
	Dec,
	HttpError,
	TransientNetworkError,
	intervalToMs,
	type Kline,
	type ModuleLogger,
} from "@klinex/core";
import type { KlinePageRequest, KlineSource } from "@klinex/data";
import type { ExportPlan } from "./exportPlan";
import { runExport } from "./runExport";

const JAN_1_2024 = 1_704_067_200_000;

const kline = (openTime: number, spanMs: number): Kline => ({
	openTime,
	open: new Dec("10"),
	high: new Dec("11"),
	low: new Dec("9"),
	close: new Dec("10"),
	volume: new Dec("2"),
	closeTime: openTime + spanMs - 1,
	quoteVolume: new Dec("20"),
	trades: 3,
	takerBuyBaseVolume: new Dec("1"),
	takerBuyQuoteVolume: new Dec("10"),
});

/** Serves one short page per request: every bucket of the last two days */
class FakeKlineSource implements KlineSource {
	readonly requests: KlinePageRequest[] = [];

	constructor(private readonly failures: Record<string, Error> = {}) {}

	async fetchKlinePage(request: KlinePageRequest): Promise<Kline[]> {
		this.requests.push(request);
		const failure = this.failures[request.symbol];
		if (failure) {
			throw failure;
		}
		const spanMs = intervalToMs(request.interval);
		const count = (2 * DAY_MS) / spanMs;
		return Array.from({ length: count }, (_, idx) => kline(JAN_1_2024 + idx * spanMs, spanMs));
	}
}

const stubLogger = (): ModuleLogger => {
	const logger: ModuleLogger = {
		log: vi.fn(),
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		child: () => logger,
	};
	return logger;
};

describe("runExport", () => {
	let workDir: string;

	beforeEach(() => {
		workDir = fs.mkdtempSync(path.join(os.tmpdir(), "klines-export-"));
	});

	afterEach(() => {
		fs.rmSync(workDir, { recursive: true, force: true });
	});

	const buildPlan = (overrides: Partial<ExportPlan["config"]> = {}): ExportPlan => ({
		symbols: ["BTCUSDT", "ETHUSDT"],
		intervals: ["1h", "4h"],
		range: { startMs: JAN_1_2024, endMs: JAN_1_2024 + 2 * DAY_MS },
		config: {
			...DEFAULT_EXPORTER_CONFIG,
			intervals: ["1h", "4h"],
			pageDelayMs: 0,
			outDir: path.join(workDir, "out"),
			...overrides,
		},
	});

	const readLines = (filePath: string): string[] =>
		fs.readFileSync(filePath, "utf-8").trimEnd().split("\n");

	it("writes one file per pair and a summary from the hourly series", async () => {
		const client = new FakeKlineSource();
		const logger = stubLogger();

		const result = await runExport(buildPlan(), { client, logger });

		const outDir = path.join(workDir, "out");
		expect(result.exported.map((entry) => [entry.symbol, entry.interval, entry.rows])).toEqual([
			["BTCUSDT", "1h", 48],
			["BTCUSDT", "4h", 12],
			["ETHUSDT", "1h", 48],
			["ETHUSDT", "4h", 12],
		]);
		expect(readLines(path.join(outDir, "klines_1h", "BTCUSDT_1h.csv"))).toHaveLength(49);
		expect(readLines(path.join(outDir, "klines_4h", "ETHUSDT_4h.csv"))).toHaveLength(13);

		expect(result.summaryPath).toBe(path.join(outDir, "summary_metrics.csv"));
		expect(readLines(result.summaryPath)).toEqual([
			"symbol,price_change_90d_pct,price_change_180d_pct,avg_daily_volume_base,avg_daily_volume_quote",
			"BTCUSDT,0.000000,0.000000,48.0000000000,480.0000000000",
			"ETHUSDT,0.000000,0.000000,48.0000000000,480.0000000000",
		]);
		expect(logger.info).toHaveBeenCalledWith(
			"export_job_completed",
			expect.objectContaining({ completed: 4, total: 4, rows: 12 })
		);
	});

	it("requests each pair over the resolved range", async () => {
		const client = new FakeKlineSource();

		await runExport(buildPlan(), { client, logger: stubLogger() });

		expect(client.requests.map((request) => `${request.symbol}:${request.interval}`)).toEqual([
			"BTCUSDT:1h",
			"BTCUSDT:4h",
			"ETHUSDT:1h",
			"ETHUSDT:4h",
		]);
		expect(client.requests[0]).toMatchObject({
			startTime: JAN_1_2024,
			endTime: JAN_1_2024 + 2 * DAY_MS,
			limit: 1000,
		});
	});

	it("writes a header-only summary when no hourly interval is exported", async () => {
		const plan = { ...buildPlan(), intervals: ["4h" as const] };

		const result = await runExport(plan, { client: new FakeKlineSource(), logger: stubLogger() });

		expect(result.summary).toEqual([]);
		expect(readLines(result.summaryPath)).toHaveLength(1);
	});

	it("aborts on a network failure by default and keeps earlier files", async () => {
		const failure = new TransientNetworkError("gave up after 3 attempt(s)", 3);
		const client = new FakeKlineSource({ ETHUSDT: failure });
		const logger = stubLogger();

		await expect(runExport(buildPlan(), { client, logger })).rejects.toBe(failure);

		const outDir = path.join(workDir, "out");
		expect(fs.existsSync(path.join(outDir, "klines_1h", "BTCUSDT_1h.csv"))).toBe(true);
		expect(fs.existsSync(path.join(outDir, "summary_metrics.csv"))).toBe(false);
		expect(logger.error).toHaveBeenCalledWith("export_job_failed", {
			code: "TRANSIENT_NETWORK",
			error: "gave up after 3 attempt(s)",
		});
	});

	it("skips pairs that exhaust the retry budget under the skip policy", async () => {
		const client = new FakeKlineSource({
			ETHUSDT: new TransientNetworkError("gave up", 3),
		});
		const logger = stubLogger();

		const result = await runExport(buildPlan({ onNetworkError: "skip" }), { client, logger });

		expect(result.skipped).toEqual([
			{ symbol: "ETHUSDT", interval: "1h", error: "gave up" },
			{ symbol: "ETHUSDT", interval: "4h", error: "gave up" },
		]);
		expect(result.summary.map((row) => row.symbol)).toEqual(["BTCUSDT"]);
		expect(logger.warn).toHaveBeenCalledTimes(2);
		expect(readLines(result.summaryPath)).toHaveLength(2);
	});

	it("never skips non-network failures", async () => {
		const failure = new HttpError("HTTP 400 Bad Request", 400);
		const client = new FakeKlineSource({ BTCUSDT: failure });

		await expect(
			runExport(buildPlan({ onNetworkError: "skip" }), { client, logger: stubLogger() })
		).rejects.toBe(failure);
	});

	it("stops before the next page once the signal is aborted", async () => {
		const controller = new AbortController();
		controller.abort(new Error("interrupted"));
		const client = new FakeKlineSource();

		await expect(
			runExport(buildPlan(), { client, logger: stubLogger(), signal: controller.signal })
		).rejects.toThrow("interrupted");
		expect(client.requests).toHaveLength(0);
	});

	it("creates nested output directories", async () => {
		const outDir = path.join(workDir, "deep", "nested");

		await runExport(buildPlan({ outDir }), { client: new FakeKlineSource(), logger: stubLogger() });

		expect(fs.existsSync(path.join(outDir, "klines_4h", "BTCUSDT_4h.csv"))).toBe(true);
	});
});
