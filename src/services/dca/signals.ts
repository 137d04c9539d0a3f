import { config, type DcaConfig } from "../../config";
import { atrSeries } from "../../indicators/atr";
import { emaSeries, last } from "../../indicators/movingAverage";
import { calculateRsi } from "../../indicators/rsi";
import { clamp, zScore } from "../../indicators/stats";
import { supertrendState, type SupertrendState } from "../../indicators/supertrend";
import type { Bar, Side } from "../../types";
import type { PriceRange } from "./range";

export type EntryIndicators = {
	price: number;
	atr: number;
	rsi: number;
	ema20: number;
	emaDeviationAtr: number;
	volumeZ: number;
	supertrend: SupertrendState | null;
};

export function computeEntryIndicators(
	bars: Bar[],
	params: DcaConfig = config.dca,
): EntryIndicators | null {
	if (bars.length < 21) return null;
	const closes = bars.map((b) => b.close);
	const price = closes[closes.length - 1];
	const atr = last(atrSeries(bars, 14));
	const ema20 = last(emaSeries(closes, 20));
	if (!Number.isFinite(atr) || atr <= 0 || !Number.isFinite(ema20)) return null;

	const volumes = bars.slice(-params.volumeWindow).map((b) => b.volume);
	const volumeZ = zScore(volumes[volumes.length - 1], volumes);

	return {
		price,
		atr,
		rsi: calculateRsi(closes, params.rsiPeriod),
		ema20,
		emaDeviationAtr: Math.abs(price - ema20) / atr,
		volumeZ: Number.isFinite(volumeZ) ? volumeZ : 0,
		supertrend: supertrendState(bars),
	};
}

/** LONG near the tactical floor, SHORT near the ceiling. */
export function entrySide(
	price: number,
	tactical: PriceRange,
	params: DcaConfig = config.dca,
): Side | null {
	const band = params.entryBandPct / 100;
	if (price <= tactical.lower * (1 + band)) return "LONG";
	if (price >= tactical.upper * (1 - band)) return "SHORT";
	return null;
}

export function entryScore(
	side: Side,
	price: number,
	tactical: PriceRange,
	indicators: EntryIndicators,
	params: DcaConfig = config.dca,
): number {
	const { lower, upper } = tactical;
	const width = Math.max(upper - lower, 1e-9);
	const isLong = side === "LONG";

	// 1 at the boundary, fading to 0 a fifth of the width inside it
	const distance = isLong ? price - lower : upper - price;
	const border = 1 - clamp(distance / (0.2 * width), 0, 1);
	const rsi = Number.isFinite(indicators.rsi) ? indicators.rsi : 50;
	const rsiTerm = isLong ? (50 - rsi) / 50 : (rsi - 50) / 50;
	const emaTerm = Math.min(indicators.emaDeviationAtr / 2, 1);
	const flip = isLong ? "down_to_up_near" : "up_to_down_near";
	const trendTerm = indicators.supertrend === flip ? 1 : 0;
	const volumeTerm = clamp(indicators.volumeZ - 0.6, 0, 1);

	const w = params.weights;
	const score =
		w.border * border +
		w.rsi * rsiTerm +
		w.emaDeviation * emaTerm +
		w.supertrend * trendTerm +
		w.volume * volumeTerm;
	return clamp(score, 0, 1);
}
