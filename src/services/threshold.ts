import { config, type ThresholdConfig } from "../config";
import { clamp, quantile } from "../indicators/stats";
import type { Side, ThresholdState } from "../types";
import { round2 } from "../utils/format";
import { logger } from "../utils/logger";

export type ScanSample = {
	scores: number[];
	/**
	 * Opens spawned this scan. They settle after the scan ends, so an attempt
	 * that later misses its touch still counts: a candidate cleared the bar.
	 */
	opened: number;
	vetoes: number;
	hitOpenCap: boolean;
};

export function initialThreshold(
	now: number,
	params: ThresholdConfig = config.threshold,
): ThresholdState {
	return {
		value: clamp(params.base, params.min, params.max),
		updatedAt: now,
		lastDelta: 0,
	};
}

/** Coarser quantile for small samples, stricter as the sample grows. */
export function quantileLevel(
	sampleSize: number,
	params: ThresholdConfig = config.threshold,
): number {
	const tier = params.quantileTiers.find((t) => sampleSize < t.belowSize);
	return tier ? tier.quantile : params.largeSampleQuantile;
}

export function nextThreshold(
	state: ThresholdState,
	sample: ScanSample,
	now: number,
	params: ThresholdConfig = config.threshold,
): ThresholdState {
	const old = state.value;
	const scores = sample.scores.filter(Number.isFinite);
	let proposed: number;

	if (scores.length < params.minSample) {
		if (sample.hitOpenCap) {
			proposed = round2(old + params.openCapBump);
		} else if (sample.opened === 0 && sample.vetoes <= params.exploreMaxVetoes) {
			proposed = round2(old - params.exploreStep);
		} else {
			return { value: old, updatedAt: now, lastDelta: 0 };
		}
	} else {
		const level = quantileLevel(scores.length, params);
		let target = clamp(quantile(scores, level) + params.pad, params.min, params.max);
		if (sample.hitOpenCap) {
			target = Math.min(params.max, target + params.openCapBump);
		}
		proposed = round2((1 - params.smoothing) * old + params.smoothing * target);
	}

	const delta = clamp(proposed - old, -params.maxJump, params.maxJump);
	const value = round2(clamp(old + delta, params.min, params.max));
	return { value, updatedAt: now, lastDelta: value - old };
}

export class ThresholdController {
	private state: ThresholdState;

	constructor(
		state: ThresholdState | null,
		private readonly params: ThresholdConfig = config.threshold,
		now = Date.now(),
	) {
		const restored = state ?? initialThreshold(now, params);
		this.state = {
			...restored,
			value: clamp(restored.value, params.min, params.max),
		};
	}

	get value(): number {
		return this.state.value;
	}

	/** Longs clear a fixed offset above the shared threshold. */
	forSide(side: Side): number {
		return side === "LONG" ? this.state.value + this.params.longOffset : this.state.value;
	}

	update(sample: ScanSample, now: number): ThresholdState {
		const previous = this.state.value;
		this.state = nextThreshold(this.state, sample, now, this.params);
		logger.info(
			{
				previous,
				threshold: this.state.value,
				delta: this.state.lastDelta,
				sample: sample.scores.length,
				opened: sample.opened,
				vetoes: sample.vetoes,
			},
			"Threshold updated",
		);
		return this.state;
	}

	snapshot(): ThresholdState {
		return { ...this.state };
	}
}
