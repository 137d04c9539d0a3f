import { defer, from, lastValueFrom, throwError, timer } from "rxjs";
import { map, mergeMap, retry, timeout, toArray } from "rxjs/operators";
import type { ExchangeGateway } from "../clients/exchange";
import { config, type FetcherConfig } from "../config";
import type { Bar, Ticker, Timeframe } from "../types";
import { errorMessage, isTransientError } from "../utils/errors";
import { logger } from "../utils/logger";

export type SeriesBatch = Map<string, Bar[] | null>;

/**
 * The single retrying call used for all market data: per-attempt timeout,
 * exponential backoff on transient failures, immediate rethrow otherwise.
 */
export function fetchWithRetry<T>(
	fn: () => Promise<T>,
	options: Pick<FetcherConfig, "timeoutMs" | "retries" | "backoffMs"> = config.fetcher,
): Promise<T> {
	return lastValueFrom(
		defer(fn).pipe(
			timeout(options.timeoutMs),
			retry({
				count: options.retries,
				delay: (error: unknown, attempt: number) =>
					isTransientError(error)
						? timer(options.backoffMs * 2 ** (attempt - 1))
						: throwError(() => error),
			}),
		),
	);
}

/** Bars for one symbol, or null when both the full and fallback requests fail. */
export async function fetchBarsWithFallback(
	gateway: ExchangeGateway,
	symbol: string,
	timeframe: Timeframe,
	limit: number,
	options: FetcherConfig = config.fetcher,
): Promise<Bar[] | null> {
	try {
		const bars = await fetchWithRetry(
			() => gateway.fetchBars(symbol, timeframe, limit),
			options,
		);
		if (bars.length) return bars;
	} catch (error) {
		logger.debug(
			{ symbol, timeframe, limit, error: errorMessage(error) },
			"Bar fetch failed",
		);
	}

	if (options.fallbackLimit >= limit) return null;

	try {
		const bars = await fetchWithRetry(
			() => gateway.fetchBars(symbol, timeframe, options.fallbackLimit),
			{ ...options, retries: 0 },
		);
		return bars.length ? bars : null;
	} catch (error) {
		logger.debug(
			{ symbol, timeframe, limit: options.fallbackLimit, error: errorMessage(error) },
			"Fallback bar fetch failed; symbol unavailable",
		);
		return null;
	}
}

export async function fetchSeriesBatch(
	gateway: ExchangeGateway,
	symbols: string[],
	timeframe: Timeframe,
	limit: number,
	options: FetcherConfig = config.fetcher,
): Promise<SeriesBatch> {
	return lastValueFrom(
		from(symbols).pipe(
			mergeMap(
				async (symbol) =>
					[
						symbol,
						await fetchBarsWithFallback(gateway, symbol, timeframe, limit, options),
					] as const,
				options.concurrency,
			),
			toArray(),
			map((entries) => new Map<string, Bar[] | null>(entries)),
		),
	);
}

export async function fetchTickerSafe(
	gateway: ExchangeGateway,
	symbol: string,
	options: FetcherConfig = config.fetcher,
): Promise<Ticker | null> {
	try {
		return await fetchWithRetry(() => gateway.fetchTicker(symbol), options);
	} catch (error) {
		logger.warn({ symbol, error: errorMessage(error) }, "Ticker unavailable");
		return null;
	}
}
