import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import { timeframeMs } from "../clients/exchange";
import { config, type GateConfig } from "../config";
import type { Bar, ExitReason, ScalpPosition } from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { EngineContext } from "./engineContext";
import { fetchTickerSafe, fetchWithRetry } from "./marketData";
import { activePositions, closePosition, replacePosition, trackExcursion } from "./positions";

export type ExitDecision = { reason: ExitReason; price: number };

/** Bracket check over one high/low range; the stop wins when both are inside. */
export function evaluateExit(
	position: ScalpPosition,
	high: number,
	low: number,
): ExitDecision | null {
	const isLong = position.side === "LONG";
	const stopHit = isLong ? low <= position.stopLoss : high >= position.stopLoss;
	if (stopHit) return { reason: "STOP_LOSS", price: position.stopLoss };
	const targetHit = isLong ? high >= position.takeProfit : low <= position.takeProfit;
	if (targetHit) return { reason: "TAKE_PROFIT", price: position.takeProfit };
	return null;
}

/**
 * Walks completed bars the position has not seen yet, then falls back to the
 * live price while the entry bar is still forming.
 */
export async function monitorScalpPosition(
	ctx: EngineContext,
	position: ScalpPosition,
	params: GateConfig = config.gate,
): Promise<ExitDecision | null> {
	const tfMs = timeframeMs(params.timeframe);
	const now = ctx.clock.now();

	let bars: Bar[];
	try {
		bars = await fetchWithRetry(() =>
			ctx.gateway.fetchBars(position.symbol, params.timeframe, 3),
		);
	} catch (error) {
		logger.debug(
			{ symbol: position.symbol, error: errorMessage(error) },
			"Monitor bars unavailable",
		);
		return null;
	}

	const fresh = bars
		.filter(
			(b) => b.openTime + tfMs <= now && b.openTime > position.lastEvaluatedBarOpenTime,
		)
		.sort((a, b) => a.openTime - b.openTime);

	let current = position;
	for (const bar of fresh) {
		current = {
			...trackExcursion(current, bar.high, bar.low),
			lastEvaluatedBarOpenTime: bar.openTime,
		};
		const exit = evaluateExit(current, bar.high, bar.low);
		if (exit) {
			replacePosition(ctx, current);
			await closePosition(ctx, current.id, exit.price, exit.reason);
			return exit;
		}
	}

	const formingOpenTime = Math.floor(now / tfMs) * tfMs;
	if (formingOpenTime === position.entryBarOpenTime) {
		const ticker = await fetchTickerSafe(ctx.gateway, position.symbol);
		if (ticker) {
			current = trackExcursion(current, ticker.last, ticker.last);
			const bracket = evaluateExit(current, ticker.last, ticker.last);
			if (bracket) {
				replacePosition(ctx, current);
				const exit = { reason: bracket.reason, price: ticker.last };
				await closePosition(ctx, current.id, exit.price, exit.reason);
				return exit;
			}
		}
	}

	if (current !== position) replacePosition(ctx, current);
	return null;
}

/** Checks positions side by side so one slow symbol only delays itself. */
export async function monitorScalpPositions(
	ctx: EngineContext,
	concurrency = config.fetcher.concurrency,
): Promise<void> {
	const positions = activePositions(ctx).filter(
		(p): p is ScalpPosition => p.kind === "scalp",
	);
	await lastValueFrom(
		from(positions).pipe(
			mergeMap(async (position) => {
				try {
					await monitorScalpPosition(ctx, position);
				} catch (error) {
					logger.warn(
						{ symbol: position.symbol, error: errorMessage(error) },
						"Position check failed",
					);
				}
			}, concurrency),
			toArray(),
		),
	);
}
