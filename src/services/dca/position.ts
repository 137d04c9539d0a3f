import { config, type DcaConfig } from "../../config";
import type { SupertrendState } from "../../indicators/supertrend";
import type { DcaPosition, DcaStep, Side } from "../../types";
import { directionOf, priceReturn } from "../positions";
import type { ExitDecision } from "../positionMonitor";
import type { PriceRange } from "./range";

export type NewDcaPosition = {
	id: string;
	symbol: string;
	side: Side;
	price: number;
	now: number;
	entryBarOpenTime: number;
	growth: number;
	stepMargins: number[];
	ladder: number[];
};

function targetFor(side: Side, averagePrice: number, tpPct: number): number {
	return averagePrice * (1 + (directionOf(side) * tpPct) / 100);
}

export function openDcaPosition(
	input: NewDcaPosition,
	params: DcaConfig = config.dca,
): DcaPosition {
	const base: DcaPosition = {
		kind: "dca",
		id: input.id,
		symbol: input.symbol,
		side: input.side,
		status: "ACTIVE",
		openedAt: input.now,
		entryBarOpenTime: input.entryBarOpenTime,
		leverage: params.leverage,
		stopLoss: null,
		takeProfit: input.price,
		maxFavorablePrice: input.price,
		maxAdversePrice: input.price,
		growth: input.growth,
		stepMargins: input.stepMargins,
		steps: [],
		quantity: 0,
		averagePrice: input.price,
		ladder: input.ladder,
		trailingStage: 0,
		frozen: false,
		reservedFinalStep: false,
	};
	return fillStep(base, input.price, input.now, false, params);
}

/**
 * Adds one step at `price` and re-averages. A retest fill spends the final
 * step's margin and consumes the reserved slot.
 */
export function fillStep(
	position: DcaPosition,
	price: number,
	now: number,
	retest = false,
	params: DcaConfig = config.dca,
): DcaPosition {
	const margins = position.stepMargins;
	const margin = retest ? margins[margins.length - 1] : margins[position.steps.length];
	if (margin === undefined) {
		throw new RangeError(`No margin planned for step ${position.steps.length + 1}`);
	}

	const quantity = (margin * position.leverage) / price;
	const totalQuantity = position.quantity + quantity;
	const averagePrice =
		position.quantity > 0
			? (position.averagePrice * position.quantity + price * quantity) / totalQuantity
			: price;
	const step: DcaStep = { price, quantity, margin, filledAt: now, retest };

	return {
		...position,
		steps: [...position.steps, step],
		quantity: totalQuantity,
		averagePrice,
		takeProfit: targetFor(position.side, averagePrice, params.tpPct),
		reservedFinalStep: retest ? false : position.reservedFinalStep,
	};
}

export function cumulativeMargin(position: DcaPosition): number {
	return position.steps.reduce((acc, step) => acc + step.margin, 0);
}

/** Next ladder level, or null once frozen or when the plan is spent. */
export function nextLadderPrice(position: DcaPosition): number | null {
	if (position.frozen) return null;
	const filled = position.steps.length;
	if (filled >= position.stepMargins.length) return null;
	return position.ladder[filled - 1] ?? null;
}

export function ladderReached(position: DcaPosition, price: number): boolean {
	const level = nextLadderPrice(position);
	if (level === null) return false;
	return position.side === "LONG" ? price <= level : price >= level;
}

/** Freezes averaging once price leaves the strategic range against the position. */
export function applyBreakoutFreeze(
	position: DcaPosition,
	price: number,
	strategic: PriceRange,
): DcaPosition {
	if (position.frozen) return position;
	const breakout =
		position.side === "LONG" ? price < strategic.lower : price > strategic.upper;
	if (!breakout) return position;
	return {
		...position,
		frozen: true,
		reservedFinalStep: position.steps.length < position.stepMargins.length,
	};
}

export function retestConfirmed(
	position: DcaPosition,
	price: number,
	strategic: PriceRange,
	trend: SupertrendState | null,
	params: DcaConfig = config.dca,
): boolean {
	if (!position.frozen || !position.reservedFinalStep) return false;
	const band = params.retestBandPct / 100;
	if (position.side === "LONG") {
		return price >= strategic.lower * (1 + band) && trend === "down_to_up_near";
	}
	return price <= strategic.upper * (1 - band) && trend === "up_to_down_near";
}

/** How far price has come toward the target, as a fraction of the way. */
export function progressToTarget(
	position: DcaPosition,
	price: number,
	params: DcaConfig = config.dca,
): number {
	return Math.max(0, priceReturn(position.side, position.averagePrice, price) / (params.tpPct / 100));
}

export type TrailUpdate = { position: DcaPosition; moved: boolean };

/**
 * Ratchets the stop through the armed stages. The stop only ever moves in
 * the position's favour, and only by at least `trailMinTicks`.
 */
export function updateTrailingStop(
	position: DcaPosition,
	price: number,
	atr: number,
	tickSize: number,
	roundPrice: (price: number) => number = (p) => p,
	params: DcaConfig = config.dca,
): TrailUpdate {
	const progress = progressToTarget(position, price, params);
	const armed = params.trailStages.filter((s) => progress >= s.armAt).length;
	const stage = Math.max(position.trailingStage, armed);
	if (stage === 0) return { position, moved: false };

	const dir = directionOf(position.side);
	const { lock } = params.trailStages[stage - 1];
	const travelled = (price - position.averagePrice) * dir;
	const locked = position.averagePrice + dir * lock * travelled;
	const chandelier = Number.isFinite(atr) ? price - dir * params.chandelierMult * atr : locked;
	const candidate = roundPrice(
		position.side === "LONG" ? Math.max(locked, chandelier) : Math.min(locked, chandelier),
	);

	const staged: DcaPosition =
		stage === position.trailingStage ? position : { ...position, trailingStage: stage };

	const current = position.stopLoss;
	if (current !== null) {
		const improvement = (candidate - current) * dir;
		if (improvement < params.trailMinTicks * tickSize || improvement <= 0) {
			return { position: staged, moved: false };
		}
	}
	return { position: { ...staged, stopLoss: candidate }, moved: true };
}

export function evaluateDcaExit(position: DcaPosition, price: number): ExitDecision | null {
	const isLong = position.side === "LONG";
	const stop = position.stopLoss;
	if (stop !== null && (isLong ? price <= stop : price >= stop)) {
		return { reason: "TRAILING_STOP", price: stop };
	}
	if (isLong ? price >= position.takeProfit : price <= position.takeProfit) {
		return { reason: "TAKE_PROFIT", price: position.takeProfit };
	}
	return null;
}
