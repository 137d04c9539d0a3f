import assert from "node:assert";
import { describe, test } from "node:test";
import { config } from "../src/config";
import {
	advanceRotation,
	buildUniverse,
	chunk,
	filterUniverse,
	rotateUniverse,
} from "../src/services/universe";
import { FakeExchange } from "./helpers/fakeExchange";

function sampleExchange(): FakeExchange {
	return new FakeExchange()
		.addMarket("BTCUSDT", { quoteVolume: 9e9 })
		.addMarket("USDCUSDT", { quoteVolume: 5e9, last: 1 })
		.addMarket("AAAUSDT", { quoteVolume: 2e6 })
		.addMarket("BBBUSDT", { quoteVolume: 5e6 })
		.addMarket("CCCUSDT", { quoteVolume: 2e6 })
		.addMarket("THINUSDT", { quoteVolume: 1_000 })
		.addMarket("DUSTUSDT", { last: 0.00001 });
}

describe("filterUniverse", () => {
	test("drops the reference, stable bases, thin and tiny markets", () => {
		const gateway = sampleExchange();
		const universe = filterUniverse(gateway.markets, gateway.stats);
		assert.deepStrictEqual(
			universe.map((e) => e.symbol),
			["BBBUSDT", "AAAUSDT", "CCCUSDT"],
		);
	});

	test("skips markets without ticker stats", () => {
		const gateway = sampleExchange();
		gateway.stats.delete("AAAUSDT");
		const universe = filterUniverse(gateway.markets, gateway.stats);
		assert.deepStrictEqual(universe.map((e) => e.symbol), ["BBBUSDT", "CCCUSDT"]);
	});

	test("honors a custom exclusion list", () => {
		const gateway = sampleExchange();
		const universe = filterUniverse(gateway.markets, gateway.stats, {
			...config.universe,
			excludedBases: ["BBB"],
		});
		assert.ok(universe.some((e) => e.symbol === "USDCUSDT"));
		assert.ok(!universe.some((e) => e.symbol === "BBBUSDT"));
	});
});

describe("buildUniverse", () => {
	test("reads markets and tickers from the gateway", async () => {
		const universe = await buildUniverse(sampleExchange());
		assert.strictEqual(universe.length, 3);
		assert.deepStrictEqual(universe[0], {
			symbol: "BBBUSDT",
			baseAsset: "BBB",
			quoteVolume: 5e6,
			last: 100,
		});
	});
});

describe("rotation", () => {
	test("rotateUniverse starts at the offset and wraps", () => {
		assert.deepStrictEqual(rotateUniverse(["a", "b", "c"], 1), ["b", "c", "a"]);
		assert.deepStrictEqual(rotateUniverse(["a", "b", "c"], 4), ["b", "c", "a"]);
		assert.deepStrictEqual(rotateUniverse([], 3), []);
	});

	test("advanceRotation wraps around the universe", () => {
		assert.strictEqual(advanceRotation(2, 2, 3), 1);
		assert.strictEqual(advanceRotation(0, 3, 3), 0);
		assert.strictEqual(advanceRotation(5, 1, 0), 0);
	});

	test("chunk splits into fixed-size groups", () => {
		assert.deepStrictEqual(chunk([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
		assert.deepStrictEqual(chunk([1, 2], 0), [[1], [2]]);
	});
});
