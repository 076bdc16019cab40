import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigError } from "./errors";
import {
	KLINE_INTERVALS,
	type KlineInterval,
	type NetworkErrorPolicy,
	isKlineInterval,
} from "./types";

export interface ExporterConfig {
	baseUrl: string;
	timeoutMs: number;
	maxAttempts: number;
	backoffBaseMs: number;
	pageDelayMs: number;
	outDir: string;
	intervals: KlineInterval[];
	days: number;
	onNetworkError: NetworkErrorPolicy;
}

export const DEFAULT_EXPORTER_CONFIG: Readonly<ExporterConfig> = {
	baseUrl: "https://data-api.binance.vision",
	timeoutMs: 20_000,
	maxAttempts: 3,
	backoffBaseMs: 1_000,
	pageDelayMs: 150,
	outDir: "out",
	intervals: ["1h", "4h"],
	days: 180,
	onNetworkError: "abort",
};

export interface ConfigLoadOptions {
	envPath?: string;
	workspaceRoot?: string;
}

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

const declaresWorkspaces = (dir: string): boolean => {
	const manifestPath = path.join(dir, "package.json");
	if (!fs.existsSync(manifestPath)) {
		return false;
	}
	try {
		const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
		return typeof manifest === "object" && manifest !== null && "workspaces" in manifest;
	} catch {
		return false;
	}
};

const isWorkspaceRoot = (dir: string): boolean =>
	WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(dir, file))) ||
	declaresWorkspaces(dir);

const rootCache = new Map<string, string>();

/**
 * Nearest ancestor of `startDir` (inclusive) holding a lock file, `.git` or a
 * package.json with `workspaces`. Falls back to `startDir`.
 */
export const findWorkspaceRoot = (startDir: string = process.cwd()): string => {
	const cached = rootCache.get(startDir);
	if (cached) {
		return cached;
	}

	let current = startDir;
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			current = startDir;
			break;
		}
		current = parent;
	}

	rootCache.set(startDir, current);
	return current;
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const parseIntegerValue = (
	value: string,
	label: string,
	options: { min: number }
): number => {
	const trimmed = value.trim();
	if (!/^-?\d+$/.test(trimmed)) {
		throw new ConfigError(`Invalid integer for ${label}: "${value}"`);
	}
	const parsed = Number(trimmed);
	if (!Number.isSafeInteger(parsed) || parsed < options.min) {
		throw new ConfigError(
			`${label} must be an integer >= ${options.min}, got ${value}`
		);
	}
	return parsed;
};

export const parseIntervalList = (
	values: string | string[],
	label = "intervals"
): KlineInterval[] => {
	const tokens = (Array.isArray(values) ? values : [values])
		.flatMap((value) => value.split(","))
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	if (!tokens.length) {
		throw new ConfigError(`${label} must list at least one interval`);
	}
	const intervals: KlineInterval[] = [];
	for (const token of tokens) {
		if (!isKlineInterval(token)) {
			throw new ConfigError(
				`Unsupported interval "${token}" in ${label}. Expected one of ${KLINE_INTERVALS.join(", ")}`
			);
		}
		if (!intervals.includes(token)) {
			intervals.push(token);
		}
	}
	return intervals;
};

export const parseNetworkErrorPolicy = (
	value: string,
	label = "onNetworkError"
): NetworkErrorPolicy => {
	const normalized = value.trim().toLowerCase();
	if (normalized === "abort" || normalized === "skip") {
		return normalized;
	}
	throw new ConfigError(`${label} must be "abort" or "skip", got "${value}"`);
};

/**
 * Build the exporter configuration from environment variables, falling back to
 * DEFAULT_EXPORTER_CONFIG for anything unset.
 */
export const readExporterConfig = (
	env: NodeJS.ProcessEnv = process.env
): ExporterConfig => {
	const defaults = DEFAULT_EXPORTER_CONFIG;
	const timeoutSec = readOptionalEnvVar(env, "KLINES_TIMEOUT_SEC");
	const maxAttempts = readOptionalEnvVar(env, "KLINES_MAX_ATTEMPTS");
	const backoffBaseMs = readOptionalEnvVar(env, "KLINES_BACKOFF_BASE_MS");
	const pageDelayMs = readOptionalEnvVar(env, "KLINES_PAGE_DELAY_MS");
	const intervals = readOptionalEnvVar(env, "KLINES_INTERVALS");
	const days = readOptionalEnvVar(env, "KLINES_DAYS");
	const onNetworkError = readOptionalEnvVar(env, "KLINES_ON_NETWORK_ERROR");

	return {
		baseUrl: (readOptionalEnvVar(env, "KLINES_BASE_URL") ?? defaults.baseUrl).replace(
			/\/+$/,
			""
		),
		timeoutMs: timeoutSec
			? parseIntegerValue(timeoutSec, "KLINES_TIMEOUT_SEC", { min: 1 }) * 1_000
			: defaults.timeoutMs,
		maxAttempts: maxAttempts
			? parseIntegerValue(maxAttempts, "KLINES_MAX_ATTEMPTS", { min: 1 })
			: defaults.maxAttempts,
		backoffBaseMs: backoffBaseMs
			? parseIntegerValue(backoffBaseMs, "KLINES_BACKOFF_BASE_MS", { min: 0 })
			: defaults.backoffBaseMs,
		pageDelayMs: pageDelayMs
			? parseIntegerValue(pageDelayMs, "KLINES_PAGE_DELAY_MS", { min: 0 })
			: defaults.pageDelayMs,
		outDir: readOptionalEnvVar(env, "KLINES_OUT_DIR") ?? defaults.outDir,
		intervals: intervals
			? parseIntervalList(intervals, "KLINES_INTERVALS")
			: [...defaults.intervals],
		days: days
			? parseIntegerValue(days, "KLINES_DAYS", { min: 1 })
			: defaults.days,
		onNetworkError: onNetworkError
			? parseNetworkErrorPolicy(onNetworkError, "KLINES_ON_NETWORK_ERROR")
			: defaults.onNetworkError,
	};
};

export const loadExporterConfig = (
	options: ConfigLoadOptions = {}
): ExporterConfig => {
	const root = options.workspaceRoot ?? findWorkspaceRoot();
	if (options.envPath) {
		const explicit = path.resolve(options.envPath);
		if (!fs.existsSync(explicit)) {
			throw new ConfigError(`Env file not found: ${explicit}`);
		}
	}
	loadEnvFiles(root, options.envPath ? path.resolve(options.envPath) : undefined);
	return readExporterConfig(process.env);
};
