import assert from "node:assert";
import { describe, test } from "node:test";
import { evaluateGate } from "../src/services/gate";
import { referenceMomentum, scoreCandidate, toCandidate, trendSlope } from "../src/services/scorer";
import type { Bar, GateResult, ScoreOutcome } from "../src/types";
import {
	approx,
	justClosed,
	longSpike,
	MINUTE,
	risingBars,
	shortSpike,
	withSignalBar,
} from "./helpers/bars";

function gateFor(signal: Omit<Bar, "openTime">): GateResult {
	const outcome = evaluateGate("AAAUSDT", withSignalBar(signal), justClosed());
	if (outcome.kind !== "evaluated") throw new Error(`gate rejected: ${outcome.reason}`);
	return outcome.result;
}

function scored(outcome: ScoreOutcome): number {
	assert.strictEqual(outcome.kind, "scored");
	return outcome.kind === "scored" ? outcome.score : Number.NaN;
}

const noContext = { trendSlope: null, referenceMomentumPct: null };

describe("trendSlope", () => {
	test("measures the MA rise over the lookback in ATR units", () => {
		const slope = trendSlope(risingBars(60, 15 * MINUTE));
		assert.ok(slope !== null && approx(slope, 1.5, 1e-6));
	});

	test("is null for short or missing series", () => {
		assert.strictEqual(trendSlope(risingBars(40, 15 * MINUTE)), null);
		assert.strictEqual(trendSlope(null), null);
	});
});

describe("referenceMomentum", () => {
	test("percent change over the lookback", () => {
		const change = referenceMomentum(risingBars(10, 5 * MINUTE), 5);
		assert.ok(change !== null && approx(change, (100.9 / 100.4 - 1) * 100, 1e-9));
	});

	test("is null without enough bars", () => {
		assert.strictEqual(referenceMomentum(risingBars(5, 5 * MINUTE), 5), null);
	});
});

describe("scoreCandidate", () => {
	test("short spike without market context", () => {
		const outcome = scoreCandidate(gateFor(shortSpike), noContext);
		assert.strictEqual(outcome.kind, "scored");
		if (outcome.kind !== "scored") return;
		assert.ok(approx(outcome.breakdown.wick, 1.25, 1e-9));
		assert.ok(approx(outcome.breakdown.spike, 0.6525, 1e-6));
		assert.strictEqual(outcome.breakdown.missingHtf, -0.15);
		assert.strictEqual(outcome.breakdown.passBonus, 0.1);
		assert.ok(approx(outcome.breakdown.maDistance, 0));
		assert.strictEqual(outcome.breakdown.sideBias, 0);
		assert.ok(approx(outcome.score, 1.8525, 1e-6));
	});

	test("long spike with an aligned trend", () => {
		const score = scored(
			scoreCandidate(gateFor(longSpike), { trendSlope: 1.5, referenceMomentumPct: 0 }),
		);
		// wick 1.25, spike 0.765, trend 0.1, pass bonus 0.1, long bias -0.1
		assert.ok(approx(score, 2.115, 1e-6));
	});

	test("strong counter-trend is vetoed", () => {
		const outcome = scoreCandidate(gateFor(shortSpike), {
			trendSlope: 1.5,
			referenceMomentumPct: null,
		});
		assert.deepStrictEqual(outcome, { kind: "vetoed", reason: "strong_counter_trend" });
	});

	test("mild counter-trend is penalized in proportion", () => {
		const outcome = scoreCandidate(gateFor(shortSpike), {
			trendSlope: 0.5,
			referenceMomentumPct: null,
		});
		assert.ok(outcome.kind === "scored" && approx(outcome.breakdown.trend, -0.15, 1e-9));
	});

	test("reference moving against a long is vetoed past the limit", () => {
		const outcome = scoreCandidate(gateFor(longSpike), {
			trendSlope: null,
			referenceMomentumPct: -1.5,
		});
		assert.deepStrictEqual(outcome, { kind: "vetoed", reason: "reference_against" });
	});

	test("reference moving against a short below the limit costs points", () => {
		const outcome = scoreCandidate(gateFor(shortSpike), {
			trendSlope: null,
			referenceMomentumPct: 0.4,
		});
		assert.ok(outcome.kind === "scored" && approx(outcome.breakdown.reference, -0.1, 1e-9));
	});

	test("distance from the MA beyond the free zone is penalized", () => {
		const gate = gateFor(shortSpike);
		const far = { ...gate, metrics: { ...gate.metrics, maDistanceAtr: 5 } };
		const outcome = scoreCandidate(far, noContext);
		assert.ok(outcome.kind === "scored" && approx(outcome.breakdown.maDistance, -0.2, 1e-9));
	});

	test("toCandidate keeps the signal bar identity", () => {
		const gate = gateFor(shortSpike);
		const candidate = toCandidate(gate, 1.9);
		assert.strictEqual(candidate.barOpenTime, 68 * MINUTE);
		assert.strictEqual(candidate.side, "SHORT");
		assert.strictEqual(candidate.score, 1.9);
		assert.strictEqual(candidate.passCount, 3);
	});
});
