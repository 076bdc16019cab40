export * from "./types";
export {
	BINANCE_MARKET_DATA_URL,
	BinanceKlinesClient,
	KLINES_PAGE_SIZE,
	KLINES_PATH,
} from "./binanceKlinesClient";
export type {
	BinanceKlinesClientOptions,
	ClientDependencies,
} from "./binanceKlinesClient";
export {
	DEFAULT_BACKOFF_BASE_MS,
	DEFAULT_MAX_ATTEMPTS,
	backoffDelayMs,
	buildUrl,
	fetchJsonWithRetry,
	fetchTransport,
} from "./http/fetchWithRetry";
export type { FetchWithRetryOptions, RetryOptions } from "./http/fetchWithRetry";
export { DEFAULT_PAGE_DELAY_MS, fetchKlineSeries } from "./historical";
export type { KlineSeriesOptions } from "./historical";
export {
	DEFAULT_RANGE_DAYS,
	parseUtcDateTime,
	resolveTimeRange,
} from "./timeRange";
export type { TimeRangeInput } from "./timeRange";
export {
	RawKlinePageSchema,
	RawKlineRowSchema,
	mapRawKline,
	parseKlinePage,
} from "./utils/klineMapper";
export type { RawKlineRow } from "./utils/klineMapper";
export { sleep } from "./utils/sleep";
