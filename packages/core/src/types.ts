import type { Decimal } from "./decimal";

export * from "./time";

/**
 * One OHLCV bucket as returned by the klines endpoint. Prices and volumes are
 * exact decimals; times are epoch milliseconds.
 */
export interface Kline {
	readonly openTime: number;
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly volume: Decimal;
	readonly closeTime: number;
	readonly quoteVolume: Decimal;
	readonly trades: number;
	readonly takerBuyBaseVolume: Decimal;
	readonly takerBuyQuoteVolume: Decimal;
}

export interface TimeRange {
	/** Inclusive lower bound, epoch ms */
	startMs: number;
	/** Inclusive upper bound, epoch ms */
	endMs: number;
}

export const KLINE_INTERVALS = [
	"1s",
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"6h",
	"8h",
	"12h",
	"1d",
	"3d",
	"1w",
	"1M",
] as const;

export type KlineInterval = (typeof KLINE_INTERVALS)[number];

export const isKlineInterval = (value: unknown): value is KlineInterval => {
	return (
		typeof value === "string" &&
		KLINE_INTERVALS.some((interval) => interval === value)
	);
};

export type NetworkErrorPolicy = "abort" | "skip";
