import { timeframeMs } from "../clients/exchange";
import { config, type GateConfig } from "../config";
import { calculateAtr } from "../indicators/atr";
import { mean, zScore } from "../indicators/stats";
import { candleAnatomy, dominantWickSide, tailLength } from "../patterns/candles";
import type { Bar, GateOutcome, GateRejectReason, GateResult } from "../types";
import type { CooldownRegistry } from "./cooldowns";

export type EligibilityContext = {
	now: number;
	cooldowns: CooldownRegistry;
	/** Active positions plus in-flight reservations for the symbol. */
	exposure(symbol: string): number;
};

type SignalBarSelection =
	| { ok: true; bar: Bar; history: Bar[]; closed: Bar[] }
	| { ok: false; reason: GateRejectReason };

export function checkEligibility(
	symbol: string,
	ctx: EligibilityContext,
	params: GateConfig = config.gate,
): GateRejectReason | null {
	if (ctx.cooldowns.isActive(symbol, ctx.now)) return "cooldown";
	if (ctx.exposure(symbol) >= params.maxPositionsPerSymbol) {
		return "position_limit";
	}
	return null;
}

/**
 * Picks the last closed bar. A still-forming last bar is dropped when enough
 * history remains behind it.
 */
export function selectSignalBar(
	bars: Bar[],
	now: number,
	params: GateConfig = config.gate,
): SignalBarSelection {
	const tfMs = timeframeMs(params.timeframe);
	const lastBar = bars[bars.length - 1];
	if (!lastBar) return { ok: false, reason: "insufficient_history" };

	const forming = lastBar.openTime + tfMs > now;
	const closed = forming ? bars.slice(0, -1) : bars;
	if (closed.length < params.atrPeriod + 2) {
		return { ok: false, reason: "insufficient_history" };
	}

	const bar = closed[closed.length - 1];
	if (bar.openTime + tfMs < now - params.staleBars * tfMs) {
		return { ok: false, reason: "stale_bar" };
	}
	return { ok: true, bar, history: closed.slice(0, -1), closed };
}

export function evaluateGate(
	symbol: string,
	bars: Bar[],
	now: number,
	params: GateConfig = config.gate,
): GateOutcome {
	const reject = (reason: GateRejectReason): GateOutcome => ({
		kind: "rejected",
		symbol,
		reason,
	});

	const selection = selectSignalBar(bars, now, params);
	if (!selection.ok) return reject(selection.reason);
	const { bar, history, closed } = selection;

	if (!(bar.close >= params.minPrice)) return reject("price_floor");

	const atr = calculateAtr(history, params.atrPeriod);
	if (!Number.isFinite(atr) || atr <= 0) return reject("non_finite");

	const anatomy = candleAnatomy(bar);
	const bodyAtr = anatomy.body / atr;
	if (anatomy.body <= 0 || bodyAtr < params.minBodyAtr) {
		return reject("micro_body");
	}

	const side = dominantWickSide(anatomy);
	if (!side) return reject("no_dominant_wick");

	const wickLength = tailLength(anatomy, side);
	const wickRatio = wickLength / anatomy.body;
	const spikeMultiple = anatomy.range / atr;

	const volumeWindow = history.slice(-params.volumeWindow).map((b) => b.volume);
	const rawZ =
		volumeWindow.length >= params.minVolumeWindow
			? zScore(bar.volume, volumeWindow)
			: Number.NaN;
	const volumeZ = Number.isFinite(rawZ) ? rawZ : null;

	const ma = mean(closed.slice(-params.maPeriod).map((b) => b.close));
	const maDistanceAtr = Math.abs(bar.close - ma) / atr;

	if (![wickRatio, spikeMultiple, maDistanceAtr].every(Number.isFinite)) {
		return reject("non_finite");
	}

	const isLong = side === "LONG";
	const passes = {
		wick: wickRatio >= (isLong ? params.wickRatioLong : params.wickRatioShort),
		range:
			spikeMultiple >= params.spikeMin &&
			spikeMultiple <= (isLong ? params.spikeMaxLong : params.spikeMaxShort),
		volume: volumeZ !== null && volumeZ >= params.volumeZ,
	};
	const passCount = Number(passes.wick) + Number(passes.range) + Number(passes.volume);

	const result: GateResult = {
		symbol,
		side,
		bar,
		metrics: {
			atr,
			bodyAtr,
			wickRatio,
			wickLength,
			spikeMultiple,
			volumeZ,
			maDistanceAtr,
		},
		passes,
		passCount,
		// range is mandatory; one of wick/volume must join it
		passed: passes.range && passCount >= 2,
	};
	return { kind: "evaluated", result };
}

export function runGate(
	symbol: string,
	bars: Bar[] | null,
	ctx: EligibilityContext,
	params: GateConfig = config.gate,
): GateOutcome {
	const ineligible = checkEligibility(symbol, ctx, params);
	if (ineligible) return { kind: "rejected", symbol, reason: ineligible };
	if (!bars) return { kind: "rejected", symbol, reason: "insufficient_history" };
	return evaluateGate(symbol, bars, ctx.now, params);
}
