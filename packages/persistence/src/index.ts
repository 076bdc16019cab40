/**
 * CSV output for exported klines and the per-symbol summary table.
 */
export {
	KLINE_CSV_COLUMNS,
	PERCENT_DECIMALS,
	PRICE_DECIMALS,
	SUMMARY_CSV_COLUMNS,
	formatDecimal,
	formatKlinesCsv,
	formatSummaryCsv,
} from "./formatCsv";
export {
	seriesCsvDirectory,
	seriesCsvPath,
	summaryCsvPath,
	writeSeriesCsv,
	writeSummaryCsv,
} from "./csvWriter";
