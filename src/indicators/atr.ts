import type { Bar } from "../types";

export function trueRanges(bars: Bar[]): number[] {
	const ranges: number[] = [];

	for (let i = 1; i < bars.length; i++) {
		const prev = bars[i - 1];
		const curr = bars[i];
		const tr = Math.max(
			curr.high - curr.low,
			Math.abs(curr.high - prev.close),
			Math.abs(curr.low - prev.close),
		);
		ranges.push(tr);
	}

	return ranges;
}

/** Simple mean of the last `period` true ranges. */
export function calculateAtr(bars: Bar[], period: number): number {
	if (bars.length < period + 1) {
		throw new Error(`Not enough bars to calculate ATR(${period})`);
	}

	const recent = trueRanges(bars).slice(-period);
	const sum = recent.reduce((acc, val) => acc + val, 0);
	return sum / period;
}

/** Wilder-smoothed ATR for every bar; entries before the seed are NaN. */
export function atrSeries(bars: Bar[], period: number): number[] {
	const out: number[] = bars.map(() => Number.NaN);
	const ranges = trueRanges(bars);
	if (ranges.length < period) return out;

	let atr = ranges.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	out[period] = atr;
	for (let i = period; i < ranges.length; i++) {
		atr = (atr * (period - 1) + ranges[i]) / period;
		out[i + 1] = atr;
	}
	return out;
}
