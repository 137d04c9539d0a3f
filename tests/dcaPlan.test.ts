import assert from "node:assert";
import { describe, test } from "node:test";
import { approxLiquidationPrice, chooseGrowth, planStepMargins } from "../src/services/dca/plan";
import { approx } from "./helpers/bars";

describe("planStepMargins", () => {
	test("geometric steps spend two thirds of the bank", () => {
		const margins = planStepMargins(1500, 2 / 3, 7, 2);
		assert.strictEqual(margins.length, 7);
		assert.ok(approx(margins[0], 1000 / 127, 1e-9));
		assert.ok(approx(margins[6], (1000 / 127) * 64, 1e-9));
		assert.ok(approx(margins.reduce((a, b) => a + b, 0), 1000, 1e-9));
		for (let i = 1; i < margins.length; i++) assert.ok(margins[i] > margins[i - 1]);
	});

	test("growth of one gives equal steps", () => {
		assert.deepStrictEqual(planStepMargins(300, 1, 3, 1), [100, 100, 100]);
	});

	test("rejects shrinking plans", () => {
		assert.throws(() => planStepMargins(1000, 1, 3, 0.9), RangeError);
	});

	test("no levels means no steps", () => {
		assert.deepStrictEqual(planStepMargins(1000, 1, 0, 2), []);
	});
});

describe("chooseGrowth", () => {
	test("thin ranges average harder", () => {
		assert.strictEqual(chooseGrowth(2, 100), 2.0);
		assert.strictEqual(chooseGrowth(5, 100), 1.6);
	});
});

describe("approxLiquidationPrice", () => {
	test("long liquidation sits below the average", () => {
		const price = approxLiquidationPrice("LONG", 100, 10, 100, 0.005);
		assert.ok(price !== null && approx(price, 900 / 9.95, 1e-9));
	});

	test("short liquidation sits above the average", () => {
		const price = approxLiquidationPrice("SHORT", 100, 10, 100, 0.005);
		assert.ok(price !== null && approx(price, 1100 / 10.05, 1e-9));
	});

	test("a long backed by its whole notional cannot be liquidated", () => {
		assert.strictEqual(approxLiquidationPrice("LONG", 100, 10, 1000, 0.005), null);
	});

	test("an empty position has no liquidation price", () => {
		assert.strictEqual(approxLiquidationPrice("SHORT", 100, 0, 100, 0.005), null);
	});
});
