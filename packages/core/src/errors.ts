export type KlineExportErrorCode =
	| "PARSE_ERROR"
	| "TRANSIENT_NETWORK"
	| "HTTP_ERROR"
	| "STORAGE_ERROR"
	| "CONFIG_ERROR";

/**
 * Base class for every failure the exporter reports. `code` lets callers
 * branch without `instanceof` chains when only the kind matters.
 */
export class KlineExportError extends Error {
	constructor(
		message: string,
		public readonly code: KlineExportErrorCode,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "KlineExportError";
	}
}

/** Malformed date/time or range input */
export class ParseError extends KlineExportError {
	constructor(
		message: string,
		public readonly value: string
	) {
		super(message, "PARSE_ERROR");
		this.name = "ParseError";
	}
}

/** Connection, timeout or rate-limit failures that outlived the retry budget */
export class TransientNetworkError extends KlineExportError {
	constructor(
		message: string,
		public readonly attempts: number,
		cause?: unknown
	) {
		super(message, "TRANSIENT_NETWORK", { cause });
		this.name = "TransientNetworkError";
	}
}

/**
 * Non-retryable response: unexpected status or malformed body. `status` is
 * null when the response was accepted but its content failed validation.
 */
export class HttpError extends KlineExportError {
	constructor(
		message: string,
		public readonly status: number | null,
		cause?: unknown
	) {
		super(message, "HTTP_ERROR", { cause });
		this.name = "HttpError";
	}
}

export class StorageError extends KlineExportError {
	constructor(
		message: string,
		public readonly path: string,
		cause?: unknown
	) {
		super(message, "STORAGE_ERROR", { cause });
		this.name = "StorageError";
	}
}

export class ConfigError extends KlineExportError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
	}
}

export const isKlineExportError = (
	value: unknown
): value is KlineExportError => value instanceof KlineExportError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
