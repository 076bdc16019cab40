import fs from "node:fs";
import path from "node:path";

import { StorageError, describeError, type Kline } from "@klinex/core";
import type { SummaryMetricsRow } from "@klinex/metrics";
import { formatKlinesCsv, formatSummaryCsv } from "./formatCsv";

/**
 * Write `contents` to `filePath`, replacing any existing file. The parent
 * directory must already exist; creating it is the caller's job.
 * @throws StorageError naming the path
 */
const writeCsvFile = (filePath: string, contents: string): void => {
	const directory = path.dirname(filePath);
	if (!fs.existsSync(directory)) {
		throw new StorageError(
			`Cannot write ${filePath}: directory ${directory} does not exist`,
			filePath
		);
	}
	try {
		fs.writeFileSync(filePath, contents, "utf-8");
	} catch (error) {
		throw new StorageError(
			`Cannot write ${filePath}: ${describeError(error)}`,
			filePath,
			error
		);
	}
};

/** @returns number of data rows written */
export const writeSeriesCsv = (filePath: string, klines: readonly Kline[]): number => {
	writeCsvFile(filePath, formatKlinesCsv(klines));
	return klines.length;
};

/** @returns number of data rows written */
export const writeSummaryCsv = (
	filePath: string,
	rows: readonly SummaryMetricsRow[]
): number => {
	writeCsvFile(filePath, formatSummaryCsv(rows));
	return rows.length;
};

export const seriesCsvDirectory = (outDir: string, interval: string): string =>
	path.join(outDir, `klines_${interval}`);

/** `<outDir>/klines_<interval>/<SYMBOL>_<interval>.csv` */
export const seriesCsvPath = (outDir: string, symbol: string, interval: string): string =>
	path.join(seriesCsvDirectory(outDir, interval), `${symbol}_${interval}.csv`);

export const summaryCsvPath = (outDir: string): string =>
	path.join(outDir, "summary_metrics.csv");
