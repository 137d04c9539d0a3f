import { config, type DcaConfig } from "../../config";
import { atrSeries } from "../../indicators/atr";
import { emaSeries, last } from "../../indicators/movingAverage";
import { quantile } from "../../indicators/stats";
import type { Bar, Side } from "../../types";

export type PriceRange = {
	lower: number;
	upper: number;
	mid: number;
	atr: number;
	width: number;
};

export type DcaRanges = {
	tactical: PriceRange;
	strategic: PriceRange;
	builtAt: number;
};

const RANGE_EMA_PERIOD = 50;
const RANGE_ATR_PERIOD = 14;

/**
 * Close-price quantile band, widened so it is never narrower than
 * EMA50 ± k·ATR.
 */
export function buildRange(bars: Bar[], params: DcaConfig = config.dca): PriceRange | null {
	if (bars.length < 2) return null;
	const closes = bars.map((b) => b.close);

	let lower = quantile(closes, params.quantileLower);
	let upper = quantile(closes, params.quantileUpper);
	const ema = last(emaSeries(closes, RANGE_EMA_PERIOD));
	const atr = last(atrSeries(bars, RANGE_ATR_PERIOD));

	let mid = closes[closes.length - 1];
	let rangeAtr = 0;
	if (Number.isFinite(ema) && Number.isFinite(atr)) {
		mid = ema;
		rangeAtr = atr;
		lower = Math.min(lower, ema - params.rangeMinAtrMult * atr);
		upper = Math.max(upper, ema + params.rangeMinAtrMult * atr);
	}

	if (![lower, upper].every(Number.isFinite) || upper <= lower) return null;
	return { lower, upper, mid, atr: rangeAtr, width: upper - lower };
}

export function buildRanges(
	bars: Bar[],
	now: number,
	params: DcaConfig = config.dca,
): DcaRanges | null {
	const tactical = buildRange(bars.slice(-params.tacticalLookback), params);
	const strategic = buildRange(bars.slice(-params.strategicLookback), params);
	if (!tactical || !strategic) return null;
	return { tactical, strategic, builtAt: now };
}

/**
 * Averaging levels below a long's first entry (above a short's), taken as
 * fractions of both range widths, nearest first. Levels closer than the
 * dedupe gap to the previous one are dropped.
 */
export function buildLadder(
	side: Side,
	firstEntry: number,
	ranges: Pick<DcaRanges, "tactical" | "strategic">,
	levels: number,
	params: DcaConfig = config.dca,
): number[] {
	const direction = side === "LONG" ? -1 : 1;
	const candidates: number[] = [];
	for (const width of [ranges.tactical.width, ranges.strategic.width]) {
		for (const pct of params.ladderPcts) {
			const price = firstEntry + direction * pct * width;
			if (price > 0 && Number.isFinite(price)) candidates.push(price);
		}
	}

	candidates.sort((a, b) => (side === "LONG" ? b - a : a - b));

	const ladder: number[] = [];
	let previous = firstEntry;
	for (const price of candidates) {
		const gapPct = (Math.abs(price - previous) / previous) * 100;
		if (gapPct < params.ladderDedupePct) continue;
		ladder.push(price);
		previous = price;
	}
	return ladder.slice(0, Math.max(0, levels - 1));
}
