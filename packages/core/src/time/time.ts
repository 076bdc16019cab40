/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS, WEEK_MS } from "./constants";

export interface ParsedInterval {
	unit: "s" | "m" | "h" | "d" | "w" | "M";
	n: number;
	/** Nominal length; calendar months are counted as 30 days */
	ms: number;
}

const UNIT_MS: Record<ParsedInterval["unit"], number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: WEEK_MS,
	M: 30 * DAY_MS,
};

const isIntervalUnit = (value: string): value is ParsedInterval["unit"] =>
	value in UNIT_MS;

/**
 * Parse a kline interval string into structured format
 * @param interval - Format: "1s", "5m", "1h", "4h", "1d", "1w", "1M"
 * @throws Error if interval format is invalid
 */
export const parseInterval = (interval: string): ParsedInterval => {
	const trimmed = interval.trim();
	const match = trimmed.match(/^(\d+)([smhdwM])$/);

	if (!match) {
		throw new Error(
			`Invalid interval format: "${interval}". Expected format like "1m", "1h", "1d", "1M"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid interval: period must be positive, got ${n} in "${interval}"`
		);
	}
	if (!isIntervalUnit(unit)) {
		throw new Error(`Invalid interval unit: "${unit}" in "${interval}"`);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

/**
 * @example intervalToMs("4h") => 14_400_000
 */
export const intervalToMs = (interval: string): number =>
	parseInterval(interval).ms;

const pad = (value: number, width = 2): string =>
	String(value).padStart(width, "0");

/**
 * Render epoch ms as `YYYY-MM-DD HH:MM:SS` in UTC. Fractional seconds are
 * truncated.
 * @example formatUtcTimestamp(3_599_999) => "1970-01-01 00:59:59"
 */
export const formatUtcTimestamp = (ms: number): string => {
	if (!Number.isFinite(ms)) {
		throw new Error(`Invalid timestamp: ${ms}`);
	}
	const date = new Date(ms);
	return (
		`${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
		`${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
	);
};

/**
 * UTC calendar day of a timestamp, `YYYY-MM-DD`
 */
export const utcDayKey = (ms: number): string =>
	formatUtcTimestamp(ms).slice(0, 10);
