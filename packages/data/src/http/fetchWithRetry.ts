import {
	HttpError,
	TransientNetworkError,
	describeError,
} from "@klinex/core";
import { sleep as defaultSleep } from "../utils/sleep";
import type {
	DataProviderLogger,
	HttpTransport,
	QueryParams,
	SleepFn,
	TransportResponse,
} from "../types";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1_000;

const BODY_SNIPPET_LENGTH = 200;

export interface RetryOptions {
	/** Total tries, first one included */
	maxAttempts?: number;
	/** Wait before try n+1 is `backoffBaseMs * 2^n` */
	backoffBaseMs?: number;
}

export interface FetchWithRetryOptions extends RetryOptions {
	timeoutMs: number;
	transport?: HttpTransport;
	sleep?: SleepFn;
	logger?: DataProviderLogger;
}

/**
 * Retry bookkeeping. `attempt` counts tries already started; `nextWaitMs` is
 * the pause scheduled before the next one.
 */
interface RetryState {
	attempt: number;
	nextWaitMs: number;
	lastFailure: unknown;
}

type AttemptOutcome =
	| { kind: "done"; data: unknown[] }
	| { kind: "retryable"; reason: "network" | "rate_limited"; cause: unknown };

export const backoffDelayMs = (attempt: number, baseMs: number): number =>
	baseMs * 2 ** attempt;

export const buildUrl = (url: string, params: QueryParams = {}): string => {
	const target = new URL(url);
	for (const [key, value] of Object.entries(params)) {
		if (value !== undefined) {
			target.searchParams.set(key, String(value));
		}
	}
	return target.toString();
};

/**
 * Default transport on the global fetch. The body is read before the timer is
 * cleared so a stalled body also counts as a timeout.
 */
export const fetchTransport: HttpTransport = async (url, { timeoutMs }) => {
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

	try {
		const response = await fetch(url, {
			method: "GET",
			headers: { Accept: "application/json" },
			signal: controller.signal,
		});
		const body = await response.text();
		return {
			status: response.status,
			statusText: response.statusText,
			body,
		};
	} catch (error) {
		if (error instanceof Error && error.name === "AbortError") {
			throw new Error(`Request timed out after ${timeoutMs}ms`, {
				cause: error,
			});
		}
		throw error;
	} finally {
		clearTimeout(timeoutId);
	}
};

const snippet = (body: string): string =>
	body.length > BODY_SNIPPET_LENGTH
		? `${body.slice(0, BODY_SNIPPET_LENGTH)}…`
		: body;

const parseJsonArray = (response: TransportResponse, url: string): unknown[] => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(response.body);
	} catch (error) {
		throw new HttpError(
			`Malformed JSON from ${url}: ${snippet(response.body)}`,
			response.status,
			error
		);
	}
	if (!Array.isArray(parsed)) {
		throw new HttpError(
			`Expected a JSON array from ${url}, got ${snippet(response.body)}`,
			response.status
		);
	}
	return parsed;
};

const runAttempt = async (
	url: string,
	transport: HttpTransport,
	timeoutMs: number
): Promise<AttemptOutcome> => {
	let response: TransportResponse;
	try {
		response = await transport(url, { timeoutMs });
	} catch (error) {
		return { kind: "retryable", reason: "network", cause: error };
	}

	if (response.status === 429) {
		return {
			kind: "retryable",
			reason: "rate_limited",
			cause: new HttpError(`Rate limited (429) by ${url}`, 429),
		};
	}
	if (response.status < 200 || response.status >= 300) {
		throw new HttpError(
			`HTTP ${response.status} ${response.statusText} from ${url}: ${snippet(response.body)}`,
			response.status
		);
	}
	return { kind: "done", data: parseJsonArray(response, url) };
};

/**
 * GET `url` with `params` and return the parsed JSON array body.
 *
 * Connection failures, timeouts and 429 responses share one attempt budget
 * and back off exponentially between tries. Any other non-2xx status, or a
 * body that is not a JSON array, fails at once with HttpError.
 *
 * @throws TransientNetworkError when every attempt failed retryably
 * @throws HttpError for non-retryable responses
 */
export async function fetchJsonWithRetry(
	url: string,
	params: QueryParams,
	options: FetchWithRetryOptions
): Promise<unknown[]> {
	const target = buildUrl(url, params);
	const maxAttempts = Math.max(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS, 1);
	const backoffBaseMs = Math.max(
		options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS,
		0
	);
	const transport = options.transport ?? fetchTransport;
	const sleep = options.sleep ?? defaultSleep;

	const state: RetryState = { attempt: 0, nextWaitMs: 0, lastFailure: undefined };

	while (state.attempt < maxAttempts) {
		state.attempt += 1;
		const outcome = await runAttempt(target, transport, options.timeoutMs);
		if (outcome.kind === "done") {
			return outcome.data;
		}

		state.lastFailure = outcome.cause;
		if (state.attempt >= maxAttempts) {
			break;
		}

		state.nextWaitMs = backoffDelayMs(state.attempt, backoffBaseMs);
		options.logger?.warn?.(
			outcome.reason === "rate_limited" ? "http_rate_limited" : "http_network_error",
			{
				url: target,
				attempt: state.attempt,
				maxAttempts,
				waitMs: state.nextWaitMs,
				error: describeError(outcome.cause),
			}
		);
		await sleep(state.nextWaitMs);
	}

	throw new TransientNetworkError(
		`GET ${target} failed after ${state.attempt} attempt(s): ${describeError(state.lastFailure)}`,
		state.attempt,
		state.lastFailure
	);
}
