import { timeframeMs } from "../../clients/exchange";
import { config, type DcaConfig, type FetcherConfig } from "../../config";
import type { DcaPosition, Side } from "../../types";
import { errorMessage, SymbolNotFoundError } from "../../utils/errors";
import { formatPrice } from "../../utils/format";
import { logger } from "../../utils/logger";
import type { EngineContext } from "../engineContext";
import { fetchBarsWithFallback, fetchTickerSafe, fetchWithRetry } from "../marketData";
import { notify } from "../notifier";
import {
	addPosition,
	closePosition,
	findActive,
	replacePosition,
	trackExcursion,
} from "../positions";
import type { Strategy } from "../strategies";
import type { TradeEvent, TradeEventType } from "../tradeLogger";
import { approxLiquidationPrice, chooseGrowth, planStepMargins } from "./plan";
import {
	applyBreakoutFreeze,
	cumulativeMargin,
	evaluateDcaExit,
	fillStep,
	ladderReached,
	nextLadderPrice,
	openDcaPosition,
	retestConfirmed,
	updateTrailingStop,
} from "./position";
import { buildLadder, buildRanges, type DcaRanges } from "./range";
import { computeEntryIndicators, entryScore, entrySide, type EntryIndicators } from "./signals";

type MarketView = {
	ranges: DcaRanges;
	indicators: EntryIndicators;
	price: number;
	at: number;
};

export function createDcaStrategy(
	params: DcaConfig = config.dca,
	fetcher: FetcherConfig = config.fetcher,
): Strategy {
	const { symbol } = params;
	let ranges: DcaRanges | null = null;
	let view: MarketView | null = null;

	const round = (ctx: EngineContext, price: number): number =>
		ctx.gateway.roundToTickSize(symbol, price);

	function liquidation(position: DcaPosition): number | null {
		return approxLiquidationPrice(
			position.side,
			position.averagePrice,
			position.quantity,
			params.bank,
			params.maintenanceMarginRatio,
		);
	}

	async function refreshRanges(ctx: EngineContext, now: number): Promise<DcaRanges | null> {
		if (ranges && now - ranges.builtAt < params.rangeRebuildMs) return ranges;
		const bars = await fetchBarsWithFallback(
			ctx.gateway,
			symbol,
			params.rangeTimeframe,
			params.strategicLookback,
			fetcher,
		);
		const built = bars ? buildRanges(bars, now, params) : null;
		if (!built) {
			logger.warn({ symbol }, "Range rebuild failed; keeping previous range");
			return ranges;
		}
		ranges = built;
		logger.info(
			{
				symbol,
				tactical: [formatPrice(built.tactical.lower), formatPrice(built.tactical.upper)],
				strategic: [formatPrice(built.strategic.lower), formatPrice(built.strategic.upper)],
			},
			"DCA ranges rebuilt",
		);
		return ranges;
	}

	async function refreshView(ctx: EngineContext): Promise<MarketView | null> {
		const now = ctx.clock.now();
		const current = await refreshRanges(ctx, now);
		if (!current) return null;

		const bars = await fetchBarsWithFallback(
			ctx.gateway,
			symbol,
			params.entryTimeframe,
			params.entryBarLimit,
			fetcher,
		);
		const indicators = bars ? computeEntryIndicators(bars, params) : null;
		if (!indicators) {
			logger.debug({ symbol }, "Entry indicators unavailable");
			return null;
		}

		const ticker = await fetchTickerSafe(ctx.gateway, symbol, fetcher);
		view = { ranges: current, indicators, price: ticker?.last ?? indicators.price, at: now };
		return view;
	}

	function eventData(position: DcaPosition, market: MarketView): TradeEvent["data"] {
		const lastStep = position.steps[position.steps.length - 1];
		const stepMargin = lastStep ? lastStep.margin : 0;
		return {
			step: position.steps.length,
			stepMargin,
			cumMargin: cumulativeMargin(position),
			leverage: position.leverage,
			averagePrice: position.averagePrice,
			takeProfit: position.takeProfit,
			stopLoss: position.stopLoss,
			liquidation: liquidation(position),
			nextLadder: nextLadderPrice(position),
			feeEstimate: stepMargin * position.leverage * params.feeTaker,
			atr: market.indicators.atr,
			rsi: market.indicators.rsi,
			supertrend: market.indicators.supertrend,
			volumeZ: market.indicators.volumeZ,
			tacticalLower: market.ranges.tactical.lower,
			tacticalUpper: market.ranges.tactical.upper,
			strategicLower: market.ranges.strategic.lower,
			strategicUpper: market.ranges.strategic.upper,
		};
	}

	async function recordEvent(
		ctx: EngineContext,
		type: TradeEventType,
		position: DcaPosition,
		market: MarketView,
	): Promise<void> {
		const at = ctx.clock.now();
		try {
			await ctx.tradeLog.recordEvent({
				eventId: `${type}_${position.id}_${type === "TRAIL" ? at : position.steps.length}`,
				signalId: position.id,
				type,
				symbol,
				side: position.side,
				at,
				data: eventData(position, market),
			});
		} catch (error) {
			logger.warn({ symbol, type, error: errorMessage(error) }, "Failed to log DCA event");
		}
	}

	function stepMessage(title: string, position: DcaPosition): string {
		return [
			title,
			`Avg: ${formatPrice(position.averagePrice)} | TP: ${formatPrice(position.takeProfit)}`,
			`Deposit: ${cumulativeMargin(position).toFixed(2)} USDT x${position.leverage}`,
			`Liquidation ≈ ${formatPrice(liquidation(position))}`,
			`Next step: ${formatPrice(nextLadderPrice(position))}`,
		].join("\n");
	}

	async function open(
		ctx: EngineContext,
		side: Side,
		market: MarketView,
		score: number,
	): Promise<void> {
		const now = ctx.clock.now();
		const price = round(ctx, market.price);
		const growth = chooseGrowth(market.ranges.strategic.width, price, params);
		const stepMargins = planStepMargins(
			params.bank,
			params.cumDepositFracAtFull,
			params.levels,
			growth,
		);
		const tfMs = timeframeMs(params.entryTimeframe);
		const position = openDcaPosition(
			{
				id: `${symbol}_${side}_${now}`,
				symbol,
				side,
				price,
				now,
				entryBarOpenTime: Math.floor(now / tfMs) * tfMs,
				growth,
				stepMargins,
				ladder: buildLadder(side, price, market.ranges, params.levels, params).map((p) =>
					round(ctx, p),
				),
			},
			params,
		);

		addPosition(ctx, position);
		ctx.stats.opens += 1;
		logger.info(
			{ symbol, side, price, score, growth, firstMargin: stepMargins[0] },
			"DCA position opened",
		);
		await ctx.persist();
		await notify(
			ctx.notifier,
			stepMessage(
				`⚡ DCA ${side} ${symbol}\nEntry: ${formatPrice(price)} | Score: ${score.toFixed(2)}`,
				position,
			),
		);
		try {
			await ctx.tradeLog.recordOpen({
				signalId: position.id,
				symbol,
				side,
				strategy: "dca",
				entryPrice: price,
				stopLoss: null,
				takeProfit: position.takeProfit,
				leverage: position.leverage,
				score,
				openedAt: now,
			});
		} catch (error) {
			logger.warn({ symbol, error: errorMessage(error) }, "Failed to record trade open");
		}
		await recordEvent(ctx, "OPEN", position, market);
	}

	/** One management pass: freeze, retest, ladder, trail, exit. */
	async function manage(
		ctx: EngineContext,
		position: DcaPosition,
		market: MarketView,
		price: number,
	): Promise<void> {
		const now = ctx.clock.now();
		let current = trackExcursion(position, price, price);
		const events: Array<{ type: TradeEventType; message: string }> = [];

		const frozen = applyBreakoutFreeze(current, price, market.ranges.strategic);
		if (frozen !== current) {
			current = frozen;
			const held = current.reservedFinalStep ? ", one retest step held" : "";
			events.push({
				type: "FREEZE",
				message: `🧊 ${symbol} broke the range at ${formatPrice(price)}; averaging frozen${held}`,
			});
		}

		if (retestConfirmed(current, price, market.ranges.strategic, market.indicators.supertrend, params)) {
			current = fillStep(current, price, now, true, params);
			events.push({ type: "RETEST", message: stepMessage(`🔁 Retest step at ${formatPrice(price)}`, current) });
		} else if (ladderReached(current, price)) {
			current = fillStep(current, price, now, false, params);
			events.push({
				type: "ADD",
				message: stepMessage(`➕ Step #${current.steps.length} at ${formatPrice(price)}`, current),
			});
		}

		const trail = updateTrailingStop(
			current,
			price,
			market.indicators.atr,
			ctx.gateway.tickSize(symbol),
			(p) => round(ctx, p),
			params,
		);
		current = trail.position;
		if (trail.moved) {
			events.push({
				type: "TRAIL",
				message: `🔒 Trailing stop ${formatPrice(current.stopLoss)} (stage ${current.trailingStage})`,
			});
		}

		if (!replacePosition(ctx, current)) {
			logger.debug({ symbol, id: current.id }, "DCA position settled mid-pass; update dropped");
			return;
		}
		for (const event of events) {
			logger.info(
				{ symbol, type: event.type, averagePrice: current.averagePrice, stopLoss: current.stopLoss },
				"DCA position updated",
			);
			await recordEvent(ctx, event.type, current, market);
			await notify(ctx.notifier, event.message);
		}
		if (events.length) await ctx.persist();

		const exit = evaluateDcaExit(current, price);
		if (exit) await closePosition(ctx, current.id, exit.price, exit.reason);
	}

	return {
		name: "dca",
		async prepare(ctx) {
			const markets = await fetchWithRetry(() => ctx.gateway.listMarkets(), fetcher);
			if (!markets.has(symbol)) throw new SymbolNotFoundError(symbol);
		},
		async scan(ctx, signal) {
			if (signal.aborted) return;
			const market = await refreshView(ctx);
			if (!market || signal.aborted) return;
			if (findActive(ctx, symbol)) return;
			if (ctx.cooldowns.isActive(symbol, ctx.clock.now())) return;

			const side = entrySide(market.price, market.ranges.tactical, params);
			if (!side) return;
			const score = entryScore(side, market.price, market.ranges.tactical, market.indicators, params);
			logger.debug({ symbol, side, score }, "DCA entry scored");
			if (score < params.scoreThreshold) return;

			const reservation = ctx.reservations.tryReserve(symbol);
			if (!reservation) return;
			try {
				await open(ctx, side, market, score);
			} finally {
				reservation.release();
			}
		},
		async monitor(ctx) {
			const position = findActive(ctx, symbol);
			if (position?.kind !== "dca") return;
			const market = view ?? (await refreshView(ctx));
			if (!market) return;
			const ticker = await fetchTickerSafe(ctx.gateway, symbol, fetcher);
			if (!ticker) return;
			await manage(ctx, position, market, ticker.last);
		},
		maxPositions: () => 1,
		describe() {
			return {
				symbol,
				leverage: params.leverage,
				bank: params.bank,
				levels: params.levels,
				tpPct: params.tpPct,
				scoreThreshold: params.scoreThreshold,
				growthThin: params.growthThin,
				growthWide: params.growthWide,
				trailStages: params.trailStages.length,
			};
		},
	};
}
