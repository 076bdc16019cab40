import { formatUtcTimestamp, type Decimal, type Kline } from "@klinex/core";
import type { SummaryMetricsRow } from "@klinex/metrics";

export const KLINE_CSV_COLUMNS = [
	"open_time_utc",
	"open",
	"high",
	"low",
	"close",
	"volume",
	"close_time_utc",
	"quote_volume",
	"trades",
	"taker_buy_base_volume",
	"taker_buy_quote_volume",
] as const;

export const SUMMARY_CSV_COLUMNS = [
	"symbol",
	"price_change_90d_pct",
	"price_change_180d_pct",
	"avg_daily_volume_base",
	"avg_daily_volume_quote",
] as const;

export const PRICE_DECIMALS = 10;
export const PERCENT_DECIMALS = 6;

type CsvRecord<Columns extends readonly string[]> = Record<Columns[number], string | number>;

/** Fixed-point text, rounded half-up; NaN stays `NaN` */
export const formatDecimal = (value: Decimal, digits: number): string =>
	value.isNaN() ? "NaN" : value.toFixed(digits);

const formatValue = (value: string | number): string => {
	const text = typeof value === "number" ? value.toString() : value;
	if (/[",\n\r]/.test(text)) {
		return `"${text.replace(/"/g, '""')}"`;
	}
	return text;
};

const toCsv = <Column extends string>(
	columns: readonly Column[],
	rows: readonly Record<Column, string | number>[]
): string => {
	const lines = [columns.join(",")];
	for (const row of rows) {
		lines.push(columns.map((column) => formatValue(row[column])).join(","));
	}
	return `${lines.join("\n")}\n`;
};

const klineRow = (kline: Kline): CsvRecord<typeof KLINE_CSV_COLUMNS> => ({
	open_time_utc: formatUtcTimestamp(kline.openTime),
	open: formatDecimal(kline.open, PRICE_DECIMALS),
	high: formatDecimal(kline.high, PRICE_DECIMALS),
	low: formatDecimal(kline.low, PRICE_DECIMALS),
	close: formatDecimal(kline.close, PRICE_DECIMALS),
	volume: formatDecimal(kline.volume, PRICE_DECIMALS),
	close_time_utc: formatUtcTimestamp(kline.closeTime),
	quote_volume: formatDecimal(kline.quoteVolume, PRICE_DECIMALS),
	trades: kline.trades,
	taker_buy_base_volume: formatDecimal(kline.takerBuyBaseVolume, PRICE_DECIMALS),
	taker_buy_quote_volume: formatDecimal(kline.takerBuyQuoteVolume, PRICE_DECIMALS),
});

const summaryRow = (row: SummaryMetricsRow): CsvRecord<typeof SUMMARY_CSV_COLUMNS> => ({
	symbol: row.symbol,
	price_change_90d_pct: formatDecimal(row.priceChange90dPct, PERCENT_DECIMALS),
	price_change_180d_pct: formatDecimal(row.priceChange180dPct, PERCENT_DECIMALS),
	avg_daily_volume_base: formatDecimal(row.avgDailyVolumeBase, PRICE_DECIMALS),
	avg_daily_volume_quote: formatDecimal(row.avgDailyVolumeQuote, PRICE_DECIMALS),
});

/** Header plus one line per kline, in input order */
export const formatKlinesCsv = (klines: readonly Kline[]): string =>
	toCsv(KLINE_CSV_COLUMNS, klines.map(klineRow));

export const formatSummaryCsv = (rows: readonly SummaryMetricsRow[]): string =>
	toCsv(SUMMARY_CSV_COLUMNS, rows.map(summaryRow));
