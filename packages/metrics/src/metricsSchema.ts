import type { Decimal } from "@klinex/core";

/**
 * One line of the summary table. Any metric may be NaN when the series was
 * empty or the reference close was zero.
 */
export interface SummaryMetricsRow {
	symbol: string;
	priceChange90dPct: Decimal;
	priceChange180dPct: Decimal;
	avgDailyVolumeBase: Decimal;
	avgDailyVolumeQuote: Decimal;
}

export interface DailyVolume {
	day: string;
	base: Decimal;
	quote: Decimal;
}
