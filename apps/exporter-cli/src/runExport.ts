import fs from "node:fs";

import {
	StorageError,
	TransientNetworkError,
	createLogger,
	describeError,
	isKlineExportError,
	type KlineInterval,
	type ModuleLogger,
} from "@klinex/core";
import { fetchKlineSeries, type KlineSource, type SleepFn } from "@klinex/data";
import { computeSummaryMetrics, type SummaryMetricsRow } from "@klinex/metrics";
import {
	seriesCsvDirectory,
	seriesCsvPath,
	summaryCsvPath,
	writeSeriesCsv,
	writeSummaryCsv,
} from "@klinex/persistence";
import type { ExportPlan } from "./exportPlan";

/** Interval whose series feeds the summary metrics */
export const METRICS_INTERVAL: KlineInterval = "1h";

export interface ExportDependencies {
	client: KlineSource;
	sleep?: SleepFn;
	signal?: AbortSignal;
	logger?: ModuleLogger;
}

export interface ExportedSeries {
	symbol: string;
	interval: KlineInterval;
	path: string;
	rows: number;
}

export interface SkippedSeries {
	symbol: string;
	interval: KlineInterval;
	error: string;
}

export interface ExportResult {
	exported: ExportedSeries[];
	skipped: SkippedSeries[];
	summary: SummaryMetricsRow[];
	summaryPath: string;
}

const ensureDirectory = (directory: string): void => {
	try {
		fs.mkdirSync(directory, { recursive: true });
	} catch (error) {
		throw new StorageError(
			`Cannot create directory ${directory}: ${describeError(error)}`,
			directory,
			error
		);
	}
};

/**
 * Export every (symbol, interval) pair of the plan in order, then write the
 * summary table. Network failures that outlive the retry budget either abort
 * the run or skip the pair, per `onNetworkError`. Files written before a
 * failure are left in place.
 */
export const runExport = async (
	plan: ExportPlan,
	deps: ExportDependencies
): Promise<ExportResult> => {
	const logger = deps.logger ?? createLogger("exporter");
	const { symbols, intervals, range, config } = plan;

	ensureDirectory(config.outDir);
	for (const interval of intervals) {
		ensureDirectory(seriesCsvDirectory(config.outDir, interval));
	}

	const total = symbols.length * intervals.length;
	const result: ExportResult = {
		exported: [],
		skipped: [],
		summary: [],
		summaryPath: summaryCsvPath(config.outDir),
	};

	logger.info("export_started", {
		symbols,
		intervals,
		startMs: range.startMs,
		endMs: range.endMs,
		outDir: config.outDir,
	});

	for (const symbol of symbols) {
		for (const interval of intervals) {
			const jobLogger = logger.child({ symbol, interval });
			try {
				const series = await fetchKlineSeries({
					client: deps.client,
					symbol,
					interval,
					startMs: range.startMs,
					endMs: range.endMs,
					pageDelayMs: config.pageDelayMs,
					sleep: deps.sleep,
					signal: deps.signal,
					logger: jobLogger,
				});

				const filePath = seriesCsvPath(config.outDir, symbol, interval);
				const rows = writeSeriesCsv(filePath, series);
				result.exported.push({ symbol, interval, path: filePath, rows });
				jobLogger.info("export_job_completed", {
					rows,
					path: filePath,
					completed: result.exported.length + result.skipped.length,
					total,
				});

				if (interval === METRICS_INTERVAL) {
					const metrics = computeSummaryMetrics(symbol, series);
					result.summary.push(metrics);
					jobLogger.info("summary_metrics_computed", { ...metrics });
				}
			} catch (error) {
				if (error instanceof TransientNetworkError && config.onNetworkError === "skip") {
					result.skipped.push({ symbol, interval, error: error.message });
					jobLogger.warn("export_job_skipped", {
						code: error.code,
						error: error.message,
						completed: result.exported.length + result.skipped.length,
						total,
					});
					continue;
				}
				jobLogger.error("export_job_failed", {
					code: isKlineExportError(error) ? error.code : "UNKNOWN",
					error: describeError(error),
				});
				throw error;
			}
		}
	}

	writeSummaryCsv(result.summaryPath, result.summary);
	logger.info("export_finished", {
		exported: result.exported.length,
		skipped: result.skipped.length,
		summaryPath: result.summaryPath,
	});
	return result;
};
