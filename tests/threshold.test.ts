import assert from "node:assert";
import { describe, test } from "node:test";
import { config } from "../src/config";
import {
	nextThreshold,
	quantileLevel,
	ThresholdController,
	type ScanSample,
} from "../src/services/threshold";
import type { ThresholdState } from "../src/types";

const at = (value: number): ThresholdState => ({ value, updatedAt: 0, lastDelta: 0 });

function sample(scores: number[], extra: Partial<ScanSample> = {}): ScanSample {
	return { scores, opened: 0, vetoes: 0, hitOpenCap: false, ...extra };
}

describe("quantileLevel", () => {
	test("tightens with the sample size", () => {
		assert.strictEqual(quantileLevel(20), 0.85);
		assert.strictEqual(quantileLevel(40), 0.95);
		assert.strictEqual(quantileLevel(119), 0.95);
		assert.strictEqual(quantileLevel(120), 0.97);
	});
});

describe("nextThreshold", () => {
	test("moves toward the upper quantile of a large sample", () => {
		const scores = [...Array(56).fill(1.0), ...Array(4).fill(2.1)];
		const next = nextThreshold(at(1.8), sample(scores, { opened: 1 }), 1_000);
		assert.strictEqual(next.value, 1.93);
		assert.strictEqual(next.updatedAt, 1_000);
	});

	test("explores downward after a quiet scan", () => {
		const next = nextThreshold(at(1.8), sample([1.2, 1.3, 1.1]), 0);
		assert.strictEqual(next.value, 1.75);
	});

	test("holds when a small sample was mostly vetoed", () => {
		const next = nextThreshold(at(1.8), sample([1.2], { vetoes: 5 }), 0);
		assert.strictEqual(next.value, 1.8);
		assert.strictEqual(next.lastDelta, 0);
	});

	test("bumps after the open cap was hit", () => {
		const next = nextThreshold(at(1.8), sample([2, 2, 2], { opened: 3, hitOpenCap: true }), 0);
		assert.strictEqual(next.value, 1.85);
	});

	test("clips large jumps", () => {
		const next = nextThreshold(at(1.5), sample(Array(20).fill(2.4)), 0);
		assert.strictEqual(next.value, 1.65);
	});

	test("never leaves its bounds", () => {
		const low = nextThreshold(at(config.threshold.min), sample([]), 0);
		assert.strictEqual(low.value, config.threshold.min);
		const high = nextThreshold(
			at(config.threshold.max),
			sample([], { opened: 3, hitOpenCap: true }),
			0,
		);
		assert.strictEqual(high.value, config.threshold.max);
	});

	test("ignores non-finite scores", () => {
		const next = nextThreshold(at(1.8), sample([Number.NaN, Number.POSITIVE_INFINITY]), 0);
		assert.strictEqual(next.value, 1.75);
	});
});

describe("ThresholdController", () => {
	test("clamps a restored value", () => {
		const controller = new ThresholdController(at(3));
		assert.strictEqual(controller.value, 2.4);
	});

	test("longs need a higher score", () => {
		const controller = new ThresholdController(at(1.8));
		assert.strictEqual(controller.forSide("SHORT"), 1.8);
		assert.ok(Math.abs(controller.forSide("LONG") - 1.9) < 1e-9);
	});

	test("update replaces the state", () => {
		const controller = new ThresholdController(at(1.8));
		controller.update(sample([]), 5_000);
		const state = controller.snapshot();
		assert.strictEqual(state.value, 1.75);
		assert.strictEqual(state.updatedAt, 5_000);
		assert.ok(Math.abs(state.lastDelta + 0.05) < 1e-9);
	});
});
