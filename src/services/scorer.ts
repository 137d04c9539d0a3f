import { config, type GateConfig, type ScorerConfig } from "../config";
import { calculateAtr } from "../indicators/atr";
import { smaSeries } from "../indicators/movingAverage";
import { clamp } from "../indicators/stats";
import type {
	Bar,
	CandidateSignal,
	GateResult,
	ScoreBreakdown,
	ScoreOutcome,
} from "../types";

export type MarketContext = {
	/** Higher-timeframe MA slope in ATR units; null when the series is missing. */
	trendSlope: number | null;
	/** Reference asset change over the lookback, in percent. */
	referenceMomentumPct: number | null;
};

export function trendSlope(
	bars: Bar[] | null,
	params: ScorerConfig = config.scorer,
): number | null {
	if (!bars || bars.length < params.maPeriod + params.slopeLookback) return null;
	if (bars.length < params.atrPeriod + 1) return null;

	const sma = smaSeries(
		bars.map((b) => b.close),
		params.maPeriod,
	);
	const now = sma[sma.length - 1];
	const before = sma[sma.length - 1 - params.slopeLookback];
	const atr = calculateAtr(bars, params.atrPeriod);
	const slope = (now - before) / atr;
	return Number.isFinite(slope) ? slope : null;
}

export function referenceMomentum(
	bars: Bar[] | null,
	lookback: number,
): number | null {
	if (!bars || bars.length < lookback + 1) return null;
	const lastClose = bars[bars.length - 1].close;
	const baseClose = bars[bars.length - 1 - lookback].close;
	const change = (lastClose / baseClose - 1) * 100;
	return Number.isFinite(change) ? change : null;
}

export function scoreCandidate(
	gate: GateResult,
	market: MarketContext,
	params: ScorerConfig = config.scorer,
	gateParams: GateConfig = config.gate,
): ScoreOutcome {
	const isLong = gate.side === "LONG";
	const direction = isLong ? 1 : -1;
	const { metrics } = gate;

	const alignment =
		market.trendSlope === null ? null : market.trendSlope * direction;
	if (alignment !== null && alignment <= -params.strongCounterTrend) {
		return { kind: "vetoed", reason: "strong_counter_trend" };
	}

	const against =
		market.referenceMomentumPct === null
			? 0
			: -market.referenceMomentumPct * direction;
	if (against >= params.referenceVetoPct) {
		return { kind: "vetoed", reason: "reference_against" };
	}

	const wickThreshold = isLong
		? gateParams.wickRatioLong
		: gateParams.wickRatioShort;

	let trend = 0;
	if (alignment !== null && alignment < 0) {
		trend =
			-params.counterTrendPenalty *
			Math.min(1, -alignment / params.strongCounterTrend);
	} else if (alignment !== null) {
		trend = params.alignmentBonus * Math.min(1, alignment);
	}

	const breakdown: ScoreBreakdown = {
		wick:
			params.wickWeight *
			clamp(metrics.wickRatio - wickThreshold, 0, params.wickExcessCap),
		spike:
			params.spikeWeight *
			clamp(metrics.spikeMultiple - gateParams.spikeMin, 0, params.spikeExcessCap),
		trend,
		reference:
			against > 0
				? -params.referencePenalty * Math.min(1, against / params.referenceVetoPct)
				: 0,
		maDistance:
			-params.maDistancePenalty *
			Math.max(0, metrics.maDistanceAtr - params.maDistanceFree),
		missingHtf: market.trendSlope === null ? -params.missingHtfPenalty : 0,
		passBonus: gate.passCount >= 3 ? params.fullPassBonus : 0,
		sideBias: isLong ? -params.longBias : 0,
	};

	const score = Object.values(breakdown).reduce((acc, val) => acc + val, 0);
	return { kind: "scored", score, breakdown, trendSlope: market.trendSlope };
}

export function toCandidate(gate: GateResult, score: number): CandidateSignal {
	return {
		symbol: gate.symbol,
		side: gate.side,
		score,
		barOpenTime: gate.bar.openTime,
		bar: gate.bar,
		metrics: gate.metrics,
		passCount: gate.passCount,
	};
}
