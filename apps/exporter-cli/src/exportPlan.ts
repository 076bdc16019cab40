import path from "node:path";

import {
	ConfigError,
	parseIntegerValue,
	parseIntervalList,
	parseNetworkErrorPolicy,
	type ExporterConfig,
	type KlineInterval,
	type TimeRange,
} from "@klinex/core";
import { resolveTimeRange } from "@klinex/data";
import { readList, readString, type ArgValue } from "./cliArgs";
import { normalizeSymbols, readSymbolsFile } from "./symbolsFile";

/** Everything one export run needs, resolved before any request is made */
export interface ExportPlan {
	symbols: string[];
	intervals: KlineInterval[];
	range: TimeRange;
	config: ExporterConfig;
}

export interface PlanOptions {
	now?: number;
	cwd?: string;
}

const readInteger = (
	args: Record<string, ArgValue>,
	key: string,
	min: number
): number | undefined => {
	const raw = readString(args, key);
	return raw === undefined ? undefined : parseIntegerValue(raw, `--${key}`, { min });
};

/**
 * Merge CLI options over the environment-derived config and resolve the
 * symbol list and time range.
 * @throws ConfigError for invalid options, ParseError for invalid dates
 */
export const buildExportPlan = (
	args: Record<string, ArgValue>,
	config: ExporterConfig,
	options: PlanOptions = {}
): ExportPlan => {
	const cwd = options.cwd ?? process.cwd();

	const listed = readList(args, "symbols") ?? [];
	const symbolsFile = readString(args, "symbolsFile");
	const fromFile = symbolsFile ? readSymbolsFile(path.resolve(cwd, symbolsFile)) : [];
	const symbols = normalizeSymbols([...listed, ...fromFile]);
	if (!symbols.length) {
		throw new ConfigError("At least one symbol is required (--symbols or --symbolsFile)");
	}

	const intervalTokens = readList(args, "intervals");
	const intervals = intervalTokens
		? parseIntervalList(intervalTokens, "--intervals")
		: config.intervals;

	const timeoutSec = readInteger(args, "timeout", 1);
	const onNetworkError = readString(args, "onNetworkError");
	const outDir = readString(args, "out");

	const merged: ExporterConfig = {
		...config,
		intervals,
		timeoutMs: timeoutSec !== undefined ? timeoutSec * 1_000 : config.timeoutMs,
		maxAttempts: readInteger(args, "retries", 1) ?? config.maxAttempts,
		pageDelayMs: readInteger(args, "pageDelayMs", 0) ?? config.pageDelayMs,
		days: readInteger(args, "days", 1) ?? config.days,
		outDir: path.resolve(cwd, outDir ?? config.outDir),
		onNetworkError: onNetworkError
			? parseNetworkErrorPolicy(onNetworkError, "--onNetworkError")
			: config.onNetworkError,
	};

	const range = resolveTimeRange({
		days: merged.days,
		start: readString(args, "start"),
		end: readString(args, "end"),
		now: options.now,
	});

	return { symbols, intervals, range, config: merged };
};
