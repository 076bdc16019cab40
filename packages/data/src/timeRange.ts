import { DAY_MS, ParseError, type TimeRange } from "@klinex/core";

export const DEFAULT_RANGE_DAYS = 180;

const UTC_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM:SS` as UTC wall-clock time.
 * Calendar overflow (`2024-02-30`, `25:00:00`) is rejected rather than rolled
 * forward.
 * @throws ParseError naming the rejected value
 */
export const parseUtcDateTime = (value: string): number => {
	const match = UTC_DATE_TIME.exec(value.trim());
	if (!match) {
		throw new ParseError(
			`Invalid date "${value}": expected YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS`,
			value
		);
	}

	const [year, month, day, hour, minute, second] = match
		.slice(1)
		.map((part) => (part === undefined ? 0 : Number(part)));
	const ms = Date.UTC(year, month - 1, day, hour, minute, second);
	const date = new Date(ms);

	const roundTrips =
		date.getUTCFullYear() === year &&
		date.getUTCMonth() === month - 1 &&
		date.getUTCDate() === day &&
		date.getUTCHours() === hour &&
		date.getUTCMinutes() === minute &&
		date.getUTCSeconds() === second;
	if (!roundTrips) {
		throw new ParseError(`Invalid date "${value}": no such calendar time`, value);
	}
	return ms;
};

export interface TimeRangeInput {
	days?: number;
	start?: string;
	end?: string;
	/** Epoch ms used when `end` is omitted */
	now?: number;
}

/**
 * Resolve the export window once per run. A missing end means now; a missing
 * start means `days` before the end. Both bounds are inclusive, so equal bounds
 * select the single kline opening at that instant; an inverted range is
 * returned as-is and pages to nothing.
 * @throws ParseError for malformed dates or a non-positive day count
 */
export const resolveTimeRange = (input: TimeRangeInput = {}): TimeRange => {
	const days = input.days ?? DEFAULT_RANGE_DAYS;
	if (!Number.isInteger(days) || days <= 0) {
		throw new ParseError(
			`Invalid day count ${days}: expected a positive integer`,
			String(days)
		);
	}

	const endMs =
		input.end !== undefined
			? parseUtcDateTime(input.end)
			: Math.floor(input.now ?? Date.now());
	const startMs =
		input.start !== undefined ? parseUtcDateTime(input.start) : endMs - days * DAY_MS;

	return { startMs, endMs };
};
