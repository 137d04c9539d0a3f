import type { Bar, Side } from "../types";

export type CandleAnatomy = {
	body: number;
	range: number;
	upperWick: number;
	lowerWick: number;
	bodyTop: number;
	bodyBottom: number;
};

export function candleAnatomy(bar: Bar): CandleAnatomy {
	const bodyTop = Math.max(bar.open, bar.close);
	const bodyBottom = Math.min(bar.open, bar.close);
	return {
		body: bodyTop - bodyBottom,
		range: bar.high - bar.low,
		upperWick: bar.high - bodyTop,
		lowerWick: bodyBottom - bar.low,
		bodyTop,
		bodyBottom,
	};
}

/**
 * Side to trade against the spike: a dominant lower wick is a rejected
 * sell-off (LONG), a dominant upper wick a rejected squeeze (SHORT).
 */
export function dominantWickSide(anatomy: CandleAnatomy): Side | null {
	if (anatomy.lowerWick > anatomy.upperWick) return "LONG";
	if (anatomy.upperWick > anatomy.lowerWick) return "SHORT";
	return null;
}

export function tailLength(anatomy: CandleAnatomy, side: Side): number {
	return side === "LONG" ? anatomy.lowerWick : anatomy.upperWick;
}

/**
 * Entry price `fraction` of the way from the body edge into the tail.
 * 0 is the body edge, 1 the wick extreme.
 */
export function tailEntryPrice(bar: Bar, side: Side, fraction: number): number {
	const anatomy = candleAnatomy(bar);
	if (side === "LONG") {
		return anatomy.bodyBottom - fraction * anatomy.lowerWick;
	}
	return anatomy.bodyTop + fraction * anatomy.upperWick;
}
