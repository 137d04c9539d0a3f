import type { Bar } from "../types";
import { atrSeries } from "./atr";

export type TrendDirection = "up" | "down";

export type SupertrendState =
	| TrendDirection
	| "down_to_up_near"
	| "up_to_down_near";

/** Direction of the supertrend band for every bar; null before the ATR seed. */
export function supertrendDirections(
	bars: Bar[],
	period: number,
	multiplier: number,
): Array<TrendDirection | null> {
	const atr = atrSeries(bars, period);
	const out: Array<TrendDirection | null> = bars.map(() => null);
	let upperBand = Number.NaN;
	let lowerBand = Number.NaN;
	let direction: TrendDirection = "up";

	for (let i = 0; i < bars.length; i++) {
		if (!Number.isFinite(atr[i])) continue;
		const bar = bars[i];
		const mid = (bar.high + bar.low) / 2;
		const basicUpper = mid + multiplier * atr[i];
		const basicLower = mid - multiplier * atr[i];
		const prevClose = i > 0 ? bars[i - 1].close : bar.close;

		const seeded = Number.isFinite(upperBand);
		upperBand =
			!seeded || basicUpper < upperBand || prevClose > upperBand
				? basicUpper
				: upperBand;
		lowerBand =
			!seeded || basicLower > lowerBand || prevClose < lowerBand
				? basicLower
				: lowerBand;

		if (bar.close > upperBand) direction = "up";
		else if (bar.close < lowerBand) direction = "down";
		out[i] = direction;
	}

	return out;
}

export function supertrendState(
	bars: Bar[],
	period = 10,
	multiplier = 3,
): SupertrendState | null {
	const directions = supertrendDirections(bars, period, multiplier);
	const curr = directions[directions.length - 1];
	const prev = directions[directions.length - 2];
	if (!curr) return null;
	if (prev === "up" && curr === "down") return "up_to_down_near";
	if (prev === "down" && curr === "up") return "down_to_up_near";
	return curr;
}
