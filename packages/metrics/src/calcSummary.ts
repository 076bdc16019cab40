import {
	DAY_MS,
	DECIMAL_NAN,
	Dec,
	utcDayKey,
	type Decimal,
	type Kline,
} from "@klinex/core";
import type { DailyVolume, SummaryMetricsRow } from "./metricsSchema";

const HUNDRED = new Dec(100);

/**
 * Close of the first kline opening at or after `targetMs`, or the last close
 * when none does.
 */
export const referenceClose = (series: readonly Kline[], targetMs: number): Decimal => {
	const reference = series.find((kline) => kline.openTime >= targetMs);
	return (reference ?? series[series.length - 1]).close;
};

/**
 * Percentage change of the last close against the close `days` before the
 * last open time. NaN for an empty series or a zero reference.
 */
export const priceChangePct = (
	series: readonly Kline[],
	days: number
): Decimal => {
	const last = series.at(-1);
	if (!last) {
		return DECIMAL_NAN;
	}
	const reference = referenceClose(series, last.openTime - days * DAY_MS);
	if (reference.isZero()) {
		return DECIMAL_NAN;
	}
	return last.close.div(reference).minus(1).times(HUNDRED);
};

/** Base and quote volume summed per UTC calendar day, in first-seen order */
export const dailyVolumes = (series: readonly Kline[]): DailyVolume[] => {
	const byDay = new Map<string, DailyVolume>();
	for (const kline of series) {
		const day = utcDayKey(kline.openTime);
		const bucket = byDay.get(day);
		if (bucket) {
			bucket.base = bucket.base.plus(kline.volume);
			bucket.quote = bucket.quote.plus(kline.quoteVolume);
		} else {
			byDay.set(day, { day, base: kline.volume, quote: kline.quoteVolume });
		}
	}
	return Array.from(byDay.values());
};

const mean = (values: Decimal[]): Decimal =>
	values.length
		? values.reduce((sum, value) => sum.plus(value), new Dec(0)).div(values.length)
		: DECIMAL_NAN;

/**
 * Summary metrics for one symbol from its hourly series, ascending by open
 * time. Partial days count as whole days in the volume averages.
 */
export const computeSummaryMetrics = (
	symbol: string,
	series: readonly Kline[]
): SummaryMetricsRow => {
	const days = dailyVolumes(series);
	return {
		symbol,
		priceChange90dPct: priceChangePct(series, 90),
		priceChange180dPct: priceChangePct(series, 180),
		avgDailyVolumeBase: mean(days.map((day) => day.base)),
		avgDailyVolumeQuote: mean(days.map((day) => day.quote)),
	};
};
