export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

export interface LoggerSettings {
	minLevel: LogLevel;
	pretty: boolean;
	json: boolean;
	modules: Set<string> | null;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel =>
	Object.prototype.hasOwnProperty.call(LEVELS, value);

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const readSettingsFromEnv = (env: NodeJS.ProcessEnv): LoggerSettings => {
	const pretty =
		env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
		modules: parseModuleFilter(env.LOG_MODULE),
	};
};

let settings: LoggerSettings = readSettingsFromEnv(process.env);

/**
 * Re-read LOG_* variables (call after dotenv has populated process.env) and
 * apply explicit overrides on top.
 */
export const configureLogger = (
	overrides: Partial<LoggerSettings> = {}
): LoggerSettings => {
	settings = { ...readSettingsFromEnv(process.env), ...overrides };
	return settings;
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.modules && !settings.modules.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
	/** Logger that stamps `context` onto every payload */
	child: (context: Record<string, unknown>) => ModuleLogger;
}

export const createLogger = (
	moduleName: string,
	context: Record<string, unknown> = {}
): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data?: Record<string, unknown>
	): void => log({ ...context, ...(data ?? {}), level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
		child: (extra) => createLogger(moduleName, { ...context, ...extra }),
	};
};

const sanitize = (payload: BaseLogPayload): unknown => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen);
};

const hasToJSON = (value: object): value is { toJSON: () => unknown } =>
	"toJSON" in value && typeof value.toJSON === "function";

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return {
			name: value.name,
			message: value.message,
			stack: value.stack,
			...(value.cause !== undefined
				? { cause: sanitizeValue(value.cause, seen) }
				: {}),
		};
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		// decimals and similar value objects
		if (hasToJSON(value)) {
			return value.toJSON();
		}
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "export_job_completed": {
				printExportJob(rest);
				break;
			}
			case "summary_metrics_computed": {
				printSummaryMetrics(rest);
				break;
			}
			case "export_job_failed": {
				printExportFailure(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const text = (value: unknown): string | undefined =>
	value === undefined || value === null ? undefined : String(value);

const printExportJob = (rest: Record<string, unknown>): void => {
	const { completed, total } = rest;
	console.table([
		{
			symbol: text(rest.symbol),
			interval: text(rest.interval),
			rows: text(rest.rows),
			path: text(rest.path),
			progress:
				typeof completed === "number" && typeof total === "number"
					? `${completed}/${total}`
					: undefined,
		},
	]);
};

const printSummaryMetrics = (rest: Record<string, unknown>): void => {
	console.table([
		{
			symbol: text(rest.symbol),
			change90d: text(rest.priceChange90dPct),
			change180d: text(rest.priceChange180dPct),
			avgDailyBase: text(rest.avgDailyVolumeBase),
			avgDailyQuote: text(rest.avgDailyVolumeQuote),
		},
	]);
};

const printExportFailure = (rest: Record<string, unknown>): void => {
	console.log(
		`  ${text(rest.symbol) ?? "-"} ${text(rest.interval) ?? "-"} failed (${
			text(rest.code) ?? "UNKNOWN"
		}): ${text(rest.error) ?? "no message"}`
	);
};
