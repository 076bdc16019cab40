import type { Kline } from "@klinex/core";
import { KLINES_PAGE_SIZE } from "./binanceKlinesClient";
import { sleep as defaultSleep } from "./utils/sleep";
import type { DataProviderLogger, KlineSource, SleepFn } from "./types";

export const DEFAULT_PAGE_DELAY_MS = 150;

export interface KlineSeriesOptions {
	client: KlineSource;
	symbol: string;
	interval: string;
	/** Inclusive, epoch ms */
	startMs: number;
	/** Inclusive, epoch ms */
	endMs: number;
	/** Pause between consecutive page requests */
	pageDelayMs?: number;
	sleep?: SleepFn;
	/** Checked between pages only; a page in flight is always parsed whole */
	signal?: AbortSignal;
	logger?: DataProviderLogger;
}

/**
 * Fetch every kline with `startMs <= openTime <= endMs`, walking the endpoint
 * page by page.
 *
 * The cursor moves to one millisecond past the last open time seen, so
 * inclusive boundaries cannot stall the loop. Rows repeated across page
 * boundaries collapse to one (last seen wins). Paging stops on an empty page,
 * on a page that reaches `endMs`, or on a short page, in that order.
 *
 * Errors from the client propagate unchanged; this layer never retries.
 *
 * @returns klines sorted by open time, unique per open time
 */
export const fetchKlineSeries = async (
	options: KlineSeriesOptions
): Promise<Kline[]> => {
	const { client, symbol, interval, startMs, endMs, logger } = options;
	if (startMs > endMs) {
		return [];
	}

	const pageDelayMs = Math.max(options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS, 0);
	const sleep = options.sleep ?? defaultSleep;
	const byOpenTime = new Map<number, Kline>();
	let cursor = startMs;
	let pages = 0;

	for (;;) {
		options.signal?.throwIfAborted();

		const page = await client.fetchKlinePage({
			symbol,
			interval,
			startTime: cursor,
			endTime: endMs,
			limit: KLINES_PAGE_SIZE,
		});
		pages += 1;

		if (!page.length) {
			break;
		}

		for (const kline of page) {
			byOpenTime.set(kline.openTime, kline);
		}

		const lastOpen = page[page.length - 1].openTime;
		logger?.debug?.("klines_page_fetched", {
			symbol,
			interval,
			page: pages,
			rows: page.length,
			cursor,
			lastOpen,
		});

		if (lastOpen >= endMs || page.length < KLINES_PAGE_SIZE) {
			break;
		}

		cursor = Math.max(lastOpen + 1, cursor + 1);
		if (pageDelayMs > 0) {
			await sleep(pageDelayMs);
		}
	}

	const series = Array.from(byOpenTime.values())
		.filter((kline) => kline.openTime >= startMs && kline.openTime <= endMs)
		.sort((a, b) => a.openTime - b.openTime);

	logger?.info?.("klines_series_loaded", {
		symbol,
		interval,
		pages,
		rows: series.length,
		startMs,
		endMs,
	});

	return series;
};
