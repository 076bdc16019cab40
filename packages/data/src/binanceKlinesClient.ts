import type { ExporterConfig, Kline } from "@klinex/core";
import { fetchJsonWithRetry } from "./http/fetchWithRetry";
import { parseKlinePage } from "./utils/klineMapper";
import type {
	DataProviderLogger,
	HttpTransport,
	KlinePageRequest,
	KlineSource,
	SleepFn,
} from "./types";

export const BINANCE_MARKET_DATA_URL = "https://data-api.binance.vision";
export const KLINES_PATH = "/api/v3/klines";

/** Largest `limit` the klines endpoint accepts */
export const KLINES_PAGE_SIZE = 1000;

export interface BinanceKlinesClientOptions {
	baseUrl?: string;
	timeoutMs?: number;
	maxAttempts?: number;
	backoffBaseMs?: number;
	transport?: HttpTransport;
	sleep?: SleepFn;
	logger?: DataProviderLogger;
}

export interface ClientDependencies {
	transport?: HttpTransport;
	sleep?: SleepFn;
	logger?: DataProviderLogger;
}

/**
 * Spot klines from Binance's public market-data domain. No credentials.
 */
export class BinanceKlinesClient implements KlineSource {
	private readonly endpoint: string;
	private readonly timeoutMs: number;

	constructor(private readonly options: BinanceKlinesClientOptions = {}) {
		const baseUrl = (options.baseUrl ?? BINANCE_MARKET_DATA_URL).replace(
			/\/+$/,
			""
		);
		this.endpoint = `${baseUrl}${KLINES_PATH}`;
		this.timeoutMs = options.timeoutMs ?? 20_000;
	}

	static fromConfig(
		config: Pick<
			ExporterConfig,
			"baseUrl" | "timeoutMs" | "maxAttempts" | "backoffBaseMs"
		>,
		deps: ClientDependencies = {}
	): BinanceKlinesClient {
		return new BinanceKlinesClient({
			baseUrl: config.baseUrl,
			timeoutMs: config.timeoutMs,
			maxAttempts: config.maxAttempts,
			backoffBaseMs: config.backoffBaseMs,
			...deps,
		});
	}

	async fetchKlinePage(request: KlinePageRequest): Promise<Kline[]> {
		if (
			!Number.isInteger(request.limit) ||
			request.limit < 1 ||
			request.limit > KLINES_PAGE_SIZE
		) {
			throw new RangeError(
				`limit must be an integer in [1, ${KLINES_PAGE_SIZE}], got ${request.limit}`
			);
		}
		const body = await fetchJsonWithRetry(
			this.endpoint,
			{
				symbol: request.symbol,
				interval: request.interval,
				startTime: request.startTime,
				endTime: request.endTime,
				limit: request.limit,
			},
			{
				timeoutMs: this.timeoutMs,
				maxAttempts: this.options.maxAttempts,
				backoffBaseMs: this.options.backoffBaseMs,
				transport: this.options.transport,
				sleep: this.options.sleep,
				logger: this.options.logger,
			}
		);
		return parseKlinePage(body);
	}
}
