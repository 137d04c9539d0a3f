import { config, type DcaConfig } from "../../config";
import type { Side } from "../../types";

/**
 * Geometric margin plan: `levels` steps growing by `growth`, summing to
 * `bank * fraction`.
 */
export function planStepMargins(
	bank: number,
	fraction: number,
	levels: number,
	growth: number,
): number[] {
	if (levels <= 0) return [];
	if (growth < 1) throw new RangeError(`Growth factor must be >= 1, got ${growth}`);

	const total = bank * fraction;
	const first =
		growth === 1 ? total / levels : (total * (growth - 1)) / (growth ** levels - 1);
	return Array.from({ length: levels }, (_, i) => first * growth ** i);
}

/** Thin strategic ranges average harder. */
export function chooseGrowth(
	strategicWidth: number,
	price: number,
	params: DcaConfig = config.dca,
): number {
	const widthPct = (strategicWidth / price) * 100;
	return widthPct < params.thinRangePct ? params.growthThin : params.growthWide;
}

/**
 * Price at which `equity` is exhausted on an isolated position of `quantity`
 * at `averagePrice`. Null when a long cannot be liquidated.
 */
export function approxLiquidationPrice(
	side: Side,
	averagePrice: number,
	quantity: number,
	equity: number,
	maintenanceMarginRatio: number,
): number | null {
	if (!(quantity > 0)) return null;
	const notional = averagePrice * quantity;
	if (side === "LONG") {
		const price = (notional - equity) / (quantity * (1 - maintenanceMarginRatio));
		return price > 0 ? price : null;
	}
	return (notional + equity) / (quantity * (1 + maintenanceMarginRatio));
}
