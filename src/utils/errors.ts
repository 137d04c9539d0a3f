import { TimeoutError } from "rxjs";
import type { Timeframe } from "../types";

export class MarketDataUnavailableError extends Error {
	constructor(
		readonly symbol: string,
		readonly timeframe: Timeframe | "ticker",
		cause?: unknown,
	) {
		super(`Market data unavailable for ${symbol} (${timeframe})`, { cause });
		this.name = "MarketDataUnavailableError";
	}
}

export class SymbolNotFoundError extends Error {
	constructor(readonly symbol: string) {
		super(`Symbol ${symbol} is not listed on the exchange`);
		this.name = "SymbolNotFoundError";
	}
}

export class OrderRejectedError extends Error {
	constructor(
		readonly symbol: string,
		message: string,
	) {
		super(`${symbol}: ${message}`);
		this.name = "OrderRejectedError";
	}
}

const TRANSIENT_CODES = new Set([
	"ECONNRESET",
	"ETIMEDOUT",
	"ECONNREFUSED",
	"EAI_AGAIN",
	"ENOTFOUND",
	"ECONNABORTED",
	"EPIPE",
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function statusOf(err: Record<string, unknown>): number | undefined {
	if (typeof err.status === "number") return err.status;
	const response = err.response;
	if (isRecord(response) && typeof response.status === "number") {
		return response.status;
	}
	return undefined;
}

export function isTransientError(err: unknown): boolean {
	if (err instanceof TimeoutError) return true;
	if (!isRecord(err)) return false;
	if (typeof err.code === "string" && TRANSIENT_CODES.has(err.code)) {
		return true;
	}
	const status = statusOf(err);
	return status === 429 || (status !== undefined && status >= 500);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
