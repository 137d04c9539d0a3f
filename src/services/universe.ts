import type { ExchangeGateway } from "../clients/exchange";
import { config, type UniverseConfig } from "../config";
import type { SymbolMeta, TickerStats, UniverseEntry } from "../types";
import { logger } from "../utils/logger";
import { fetchWithRetry } from "./marketData";

export function filterUniverse(
	markets: Map<string, SymbolMeta>,
	tickers: Map<string, TickerStats>,
	params: UniverseConfig = config.universe,
): UniverseEntry[] {
	const excluded = new Set(params.excludedBases);
	const entries: UniverseEntry[] = [];

	for (const meta of markets.values()) {
		if (meta.symbol === params.referenceSymbol) continue;
		if (excluded.has(meta.baseAsset.toUpperCase())) continue;
		const stats = tickers.get(meta.symbol);
		if (!stats) continue;
		if (!(stats.quoteVolume >= params.minQuoteVolume)) continue;
		if (!(stats.last >= params.minPrice)) continue;
		entries.push({
			symbol: meta.symbol,
			baseAsset: meta.baseAsset,
			quoteVolume: stats.quoteVolume,
			last: stats.last,
		});
	}

	return entries.sort(
		(a, b) => b.quoteVolume - a.quoteVolume || a.symbol.localeCompare(b.symbol),
	);
}

export async function buildUniverse(
	gateway: ExchangeGateway,
	params: UniverseConfig = config.universe,
): Promise<UniverseEntry[]> {
	const [markets, tickers] = await Promise.all([
		fetchWithRetry(() => gateway.listMarkets()),
		fetchWithRetry(() => gateway.fetchTickersBatch()),
	]);
	const universe = filterUniverse(markets, tickers, params);
	logger.debug(
		{ markets: markets.size, eligible: universe.length },
		"Universe rebuilt",
	);
	return universe;
}

/** Ring-buffer view starting at `offset`. */
export function rotateUniverse<T>(entries: T[], offset: number): T[] {
	if (!entries.length) return [];
	const start = ((offset % entries.length) + entries.length) % entries.length;
	return [...entries.slice(start), ...entries.slice(0, start)];
}

export function advanceRotation(
	offset: number,
	processed: number,
	size: number,
): number {
	if (size <= 0) return 0;
	return (offset + processed) % size;
}

export function chunk<T>(items: T[], size: number): T[][] {
	const chunks: T[][] = [];
	const step = Math.max(1, Math.floor(size));
	for (let i = 0; i < items.length; i += step) {
		chunks.push(items.slice(i, i + step));
	}
	return chunks;
}
