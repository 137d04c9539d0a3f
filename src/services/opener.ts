import { timeframeMs } from "../clients/exchange";
import { config, type GateConfig, type OpenerConfig } from "../config";
import { tailEntryPrice } from "../patterns/candles";
import type { CandidateSignal, ScalpPosition } from "../types";
import { errorMessage } from "../utils/errors";
import { formatPrice } from "../utils/format";
import { logger } from "../utils/logger";
import type { EngineContext } from "./engineContext";
import { fetchTickerSafe } from "./marketData";
import { notify } from "./notifier";
import { activePositions, addPosition, findActive } from "./positions";

export type AggressionTier = OpenerConfig["aggressionTiers"][number];

export type EntryPlan = {
	entryPrice: number;
	stopLoss: number;
	takeProfit: number;
	tolerance: number;
	tailFraction: number;
	tpPct: number;
	margin: number;
};

export type OpenResult =
	| { kind: "opened"; position: ScalpPosition }
	| { kind: "no_touch"; lastPrice: number | null }
	| { kind: "skipped"; reason: "capacity" | "already_open" | "aborted" }
	| { kind: "failed"; error: string };

export type SpawnResult =
	| { kind: "spawned"; done: Promise<void> }
	| { kind: "capacity" }
	| { kind: "already_reserved" };

/** Wider score margins get a deeper tail entry and a larger target. */
export function aggressionFor(
	margin: number,
	params: OpenerConfig = config.opener,
): AggressionTier {
	const tiers = [...params.aggressionTiers].sort((a, b) => b.minMargin - a.minMargin);
	return tiers.find((t) => margin >= t.minMargin) ?? tiers[tiers.length - 1];
}

export function touchTolerance(
	price: number,
	tickSize: number,
	wickLength: number,
	atr: number,
	params: OpenerConfig = config.opener,
): number {
	const floorPct = price < params.lowPriceCutoff ? params.lowPriceFloorPct : params.floorPct;
	let tolerance = Math.max(
		params.touchTicks * tickSize,
		params.touchWickFrac * wickLength,
		params.touchAtrFrac * atr,
		(price * floorPct) / 100,
	);
	if ((atr / price) * 100 < params.lowVolatilityAtrPct) {
		tolerance = Math.max(tolerance, (price * params.lowVolatilityFloorPct) / 100);
	}
	return tolerance;
}

export function planEntry(
	candidate: CandidateSignal,
	threshold: number,
	tickSize: number,
	roundPrice: (price: number) => number,
	params: OpenerConfig = config.opener,
): EntryPlan {
	const margin = candidate.score - threshold;
	const tier = aggressionFor(margin, params);
	const isLong = candidate.side === "LONG";

	const entryPrice = roundPrice(
		tailEntryPrice(candidate.bar, candidate.side, tier.tailFraction),
	);
	const stopDistance = Math.max(
		(entryPrice * params.slPct) / 100,
		params.slAtrMult * candidate.metrics.atr,
	);
	const targetDistance = (entryPrice * tier.tpPct) / 100;

	return {
		entryPrice,
		stopLoss: roundPrice(isLong ? entryPrice - stopDistance : entryPrice + stopDistance),
		takeProfit: roundPrice(isLong ? entryPrice + targetDistance : entryPrice - targetDistance),
		tolerance: touchTolerance(
			entryPrice,
			tickSize,
			candidate.metrics.wickLength,
			candidate.metrics.atr,
			params,
		),
		tailFraction: tier.tailFraction,
		tpPct: tier.tpPct,
		margin,
	};
}

export function signalId(candidate: CandidateSignal): string {
	return `${candidate.symbol}_${candidate.side}_${candidate.barOpenTime}`;
}

function formatOpenMessage(position: ScalpPosition, plan: EntryPlan): string {
	return [
		`⚡ ${position.side} ${position.symbol}`,
		`Entry: ${formatPrice(position.entryPrice)}`,
		`SL: ${formatPrice(position.stopLoss)} | TP: ${formatPrice(position.takeProfit)} (${plan.tpPct.toFixed(2)}%)`,
		`Score: ${position.score.toFixed(2)} (margin ${plan.margin.toFixed(2)})`,
		`Size: ${position.sizeUsdt} USDT x${position.leverage}`,
	].join("\n");
}

/**
 * Polls the live price until it trades within tolerance of the planned
 * entry, giving up once the bar after the signal bar has closed.
 */
async function awaitTouch(
	ctx: EngineContext,
	candidate: CandidateSignal,
	plan: EntryPlan,
	deadline: number,
	signal: AbortSignal | undefined,
	params: OpenerConfig,
): Promise<{ touched: boolean; lastPrice: number | null; aborted: boolean }> {
	let lastPrice: number | null = null;
	for (;;) {
		if (signal?.aborted) return { touched: false, lastPrice, aborted: true };

		const ticker = await fetchTickerSafe(ctx.gateway, candidate.symbol);
		if (ticker) {
			lastPrice = ticker.last;
			if (Math.abs(ticker.last - plan.entryPrice) <= plan.tolerance) {
				return { touched: true, lastPrice, aborted: false };
			}
		}

		if (ctx.clock.now() + params.touchPollMs > deadline) {
			return { touched: false, lastPrice, aborted: false };
		}
		await ctx.sleep(params.touchPollMs);
	}
}

export async function openPosition(
	ctx: EngineContext,
	candidate: CandidateSignal,
	threshold: number,
	signal?: AbortSignal,
	params: OpenerConfig = config.opener,
	gateParams: GateConfig = config.gate,
): Promise<OpenResult> {
	const { symbol } = candidate;
	try {
		const plan = planEntry(
			candidate,
			threshold,
			ctx.gateway.tickSize(symbol),
			(price) => ctx.gateway.roundToTickSize(symbol, price),
			params,
		);
		const tfMs = timeframeMs(gateParams.timeframe);
		const deadline = candidate.barOpenTime + 2 * tfMs;

		const touch = await awaitTouch(ctx, candidate, plan, deadline, signal, params);
		if (touch.aborted) return { kind: "skipped", reason: "aborted" };
		if (!touch.touched) {
			ctx.stats.noTouch += 1;
			logger.debug(
				{
					symbol,
					entry: plan.entryPrice,
					lastPrice: touch.lastPrice,
					tolerance: plan.tolerance,
				},
				"Entry not touched; open abandoned",
			);
			return { kind: "no_touch", lastPrice: touch.lastPrice };
		}

		if (findActive(ctx, symbol)) return { kind: "skipped", reason: "already_open" };
		if (activePositions(ctx).length >= params.maxConcurrentPositions) {
			return { kind: "skipped", reason: "capacity" };
		}

		const now = ctx.clock.now();
		const entryBarOpenTime = Math.floor(now / tfMs) * tfMs;
		const position: ScalpPosition = {
			kind: "scalp",
			id: signalId(candidate),
			symbol,
			side: candidate.side,
			status: "ACTIVE",
			openedAt: now,
			entryBarOpenTime,
			lastEvaluatedBarOpenTime: entryBarOpenTime,
			leverage: params.leverage,
			entryPrice: plan.entryPrice,
			stopLoss: plan.stopLoss,
			takeProfit: plan.takeProfit,
			sizeUsdt: params.positionSizeUsdt,
			score: candidate.score,
			maxFavorablePrice: plan.entryPrice,
			maxAdversePrice: plan.entryPrice,
		};

		addPosition(ctx, position);
		ctx.cooldowns.set(symbol, now + params.cooldownMs);
		ctx.stats.opens += 1;
		logger.info(
			{
				symbol,
				side: position.side,
				entry: position.entryPrice,
				stopLoss: position.stopLoss,
				takeProfit: position.takeProfit,
				score: candidate.score,
				threshold,
			},
			"Position opened",
		);

		await ctx.persist();
		await notify(ctx.notifier, formatOpenMessage(position, plan));
		try {
			await ctx.tradeLog.recordOpen({
				signalId: position.id,
				symbol,
				side: position.side,
				strategy: "wick_spike",
				entryPrice: position.entryPrice,
				stopLoss: position.stopLoss,
				takeProfit: position.takeProfit,
				leverage: position.leverage,
				score: candidate.score,
				openedAt: now,
			});
			await ctx.tradeLog.recordEvent({
				eventId: `OPEN_${position.id}`,
				signalId: position.id,
				type: "OPEN",
				symbol,
				side: position.side,
				at: now,
				data: {
					entryPrice: position.entryPrice,
					stopLoss: position.stopLoss,
					takeProfit: position.takeProfit,
					score: candidate.score,
					threshold,
					tailFraction: plan.tailFraction,
					wickRatio: candidate.metrics.wickRatio,
					spikeMultiple: candidate.metrics.spikeMultiple,
					volumeZ: candidate.metrics.volumeZ,
				},
			});
		} catch (error) {
			logger.warn({ symbol, error: errorMessage(error) }, "Failed to record trade open");
		}

		return { kind: "opened", position };
	} catch (error) {
		ctx.stats.openFailures += 1;
		logger.warn({ symbol, error: errorMessage(error) }, "Open attempt failed");
		return { kind: "failed", error: errorMessage(error) };
	}
}

/**
 * Reserves the symbol and runs the open in the background. The reservation
 * is released by the task's completion handler, whatever the outcome.
 */
export function trySpawnOpen(
	ctx: EngineContext,
	candidate: CandidateSignal,
	threshold: number,
	signal?: AbortSignal,
	params: OpenerConfig = config.opener,
): SpawnResult {
	if (activePositions(ctx).length + ctx.reservations.size >= params.maxConcurrentPositions) {
		return { kind: "capacity" };
	}
	const reservation = ctx.reservations.tryReserve(candidate.symbol);
	if (!reservation) return { kind: "already_reserved" };

	const done: Promise<void> = openPosition(ctx, candidate, threshold, signal, params)
		.then(
			(result) => {
				logger.debug({ symbol: candidate.symbol, result: result.kind }, "Open attempt finished");
			},
			(error: unknown) => {
				logger.error(
					{ symbol: candidate.symbol, error: errorMessage(error) },
					"Open task crashed",
				);
			},
		)
		.finally(() => {
			reservation.release();
			ctx.pendingOpens.delete(done);
		});
	ctx.pendingOpens.add(done);
	return { kind: "spawned", done };
}
