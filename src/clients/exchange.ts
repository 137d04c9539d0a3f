import type { Bar, SymbolMeta, Ticker, TickerStats, Timeframe } from "../types";

/** What the engine needs from an exchange; no order routing. */
export interface ExchangeGateway {
	listMarkets(): Promise<Map<string, SymbolMeta>>;
	fetchBars(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]>;
	fetchTicker(symbol: string): Promise<Ticker>;
	fetchTickersBatch(): Promise<Map<string, TickerStats>>;
	roundToTickSize(symbol: string, price: number): number;
	tickSize(symbol: string): number;
	close(): Promise<void>;
}

export function timeframeMs(timeframe: Timeframe): number {
	const amount = Number(timeframe.slice(0, -1));
	const unit = timeframe.slice(-1);
	const unitMs =
		unit === "m" ? 60_000 : unit === "h" ? 3_600_000 : 86_400_000;
	return amount * unitMs;
}

export function applyTickSize(price: number, tickSize: number): number {
	if (!(tickSize > 0)) return price;
	const precision = Math.max(0, Math.ceil(Math.abs(Math.log10(tickSize))));
	const adjusted = Math.round(price / tickSize) * tickSize;
	return Number(adjusted.toFixed(precision + 1));
}
