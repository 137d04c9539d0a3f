import { USDMClient } from "binance";
import { config } from "../config";
import type { Bar, SymbolMeta, Ticker, TickerStats, Timeframe } from "../types";
import {
	isRecord,
	MarketDataUnavailableError,
	OrderRejectedError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { applyTickSize, type ExchangeGateway } from "./exchange";

function toNumber(value: unknown): number {
	if (typeof value === "number") return value;
	if (typeof value === "string") return Number(value);
	return Number.NaN;
}

function parseSymbolMeta(raw: unknown): SymbolMeta | null {
	if (!isRecord(raw)) return null;
	const { symbol, baseAsset, quoteAsset, status, filters } = raw;
	if (typeof symbol !== "string" || typeof baseAsset !== "string") return null;
	if (typeof quoteAsset !== "string" || status !== "TRADING") return null;

	let tickSize = 0;
	if (Array.isArray(filters)) {
		for (const filter of filters) {
			if (isRecord(filter) && filter.filterType === "PRICE_FILTER") {
				tickSize = toNumber(filter.tickSize);
			}
		}
	}
	return { symbol, baseAsset, quoteAsset, tickSize };
}

function parseKline(raw: unknown): Bar | null {
	if (!Array.isArray(raw) || raw.length < 6) return null;
	const bar: Bar = {
		openTime: toNumber(raw[0]),
		open: toNumber(raw[1]),
		high: toNumber(raw[2]),
		low: toNumber(raw[3]),
		close: toNumber(raw[4]),
		volume: toNumber(raw[5]),
	};
	return Object.values(bar).every(Number.isFinite) ? bar : null;
}

function asList(raw: unknown): unknown[] {
	return Array.isArray(raw) ? raw : [raw];
}

export class BinanceGateway implements ExchangeGateway {
	private readonly client: USDMClient;
	private markets: Map<string, SymbolMeta> | null = null;

	constructor(private readonly quoteAsset = config.universe.quoteAsset) {
		this.client = new USDMClient({
			api_key: config.binance.apiKey,
			api_secret: config.binance.apiSecret,
			baseUrl: config.binance.baseUrl,
			beautifyResponses: true,
			testnet: config.binance.testnet,
		});
	}

	async listMarkets(): Promise<Map<string, SymbolMeta>> {
		if (this.markets) return this.markets;

		const info: unknown = await this.client.getExchangeInfo();
		const symbols = isRecord(info) && Array.isArray(info.symbols) ? info.symbols : [];
		const markets = new Map<string, SymbolMeta>();
		for (const raw of symbols) {
			const meta = parseSymbolMeta(raw);
			if (!meta || meta.quoteAsset !== this.quoteAsset) continue;
			if (meta.symbol.includes("_")) continue;
			markets.set(meta.symbol, meta);
		}

		logger.info({ count: markets.size }, "Loaded exchange markets");
		this.markets = markets;
		return markets;
	}

	async fetchBars(
		symbol: string,
		timeframe: Timeframe,
		limit: number,
	): Promise<Bar[]> {
		const data: unknown = await this.client.getKlines({
			symbol,
			interval: timeframe,
			limit,
		});
		return asList(data)
			.map(parseKline)
			.filter((bar): bar is Bar => bar !== null);
	}

	async fetchTicker(symbol: string): Promise<Ticker> {
		const [book, price]: [unknown, unknown] = await Promise.all([
			this.client.getSymbolOrderBookTicker({ symbol }),
			this.client.getSymbolPriceTicker({ symbol }),
		]);
		const bookEntry = asList(book).find(
			(entry) => isRecord(entry) && entry.symbol === symbol,
		);
		const priceEntry = asList(price).find(
			(entry) => isRecord(entry) && entry.symbol === symbol,
		);
		const last = isRecord(priceEntry) ? toNumber(priceEntry.price) : Number.NaN;
		const bid = isRecord(bookEntry) ? toNumber(bookEntry.bidPrice) : last;
		const ask = isRecord(bookEntry) ? toNumber(bookEntry.askPrice) : last;
		if (!Number.isFinite(last)) {
			throw new MarketDataUnavailableError(symbol, "ticker");
		}
		return { last, bid, ask };
	}

	async fetchTickersBatch(): Promise<Map<string, TickerStats>> {
		const data: unknown = await this.client.get24hrChangeStatistics();
		const stats = new Map<string, TickerStats>();
		for (const entry of asList(data)) {
			if (!isRecord(entry) || typeof entry.symbol !== "string") continue;
			stats.set(entry.symbol, {
				symbol: entry.symbol,
				last: toNumber(entry.lastPrice),
				quoteVolume: toNumber(entry.quoteVolume),
				priceChangePct: toNumber(entry.priceChangePercent),
			});
		}
		return stats;
	}

	tickSize(symbol: string): number {
		return this.markets?.get(symbol)?.tickSize ?? 0;
	}

	/** Throws when the symbol's price filter is unknown. */
	roundToTickSize(symbol: string, price: number): number {
		const tickSize = this.tickSize(symbol);
		if (!(tickSize > 0)) {
			throw new OrderRejectedError(symbol, "price filter unavailable");
		}
		return applyTickSize(price, tickSize);
	}

	async close(): Promise<void> {
		this.markets = null;
	}
}
