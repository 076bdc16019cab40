import type { Kline } from "@klinex/core";

export interface DataProviderLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface TransportResponse {
	status: number;
	statusText: string;
	body: string;
}

/**
 * Performs one GET. Must reject on connection failure or timeout and resolve
 * with whatever status the server answered otherwise.
 */
export type HttpTransport = (
	url: string,
	init: { timeoutMs: number }
) => Promise<TransportResponse>;

export type QueryParams = Record<string, string | number | undefined>;

export interface KlinePageRequest {
	symbol: string;
	interval: string;
	startTime: number;
	endTime: number;
	limit: number;
}

/**
 * One page of the klines endpoint, already parsed. Order follows the server.
 */
export interface KlineSource {
	fetchKlinePage(request: KlinePageRequest): Promise<Kline[]>;
}
