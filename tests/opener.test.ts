import assert from "node:assert";
import { describe, test } from "node:test";
import { applyTickSize } from "../src/clients/exchange";
import { config } from "../src/config";
import { evaluateGate } from "../src/services/gate";
import {
	aggressionFor,
	openPosition,
	planEntry,
	signalId,
	touchTolerance,
	trySpawnOpen,
} from "../src/services/opener";
import { addPosition } from "../src/services/positions";
import { ReservationSet, type Reservation } from "../src/services/reservations";
import { toCandidate } from "../src/services/scorer";
import type { Bar, CandidateSignal } from "../src/types";
import { approx, justClosed, longSpike, MINUTE, shortSpike, withSignalBar } from "./helpers/bars";
import { createTestEngine } from "./helpers/engine";
import { FakeExchange } from "./helpers/fakeExchange";

const NOW = justClosed();
const round = (price: number) => applyTickSize(price, 0.01);

function candidate(signal: Omit<Bar, "openTime">, score: number, symbol = "AAAUSDT"): CandidateSignal {
	const outcome = evaluateGate(symbol, withSignalBar(signal), NOW);
	if (outcome.kind !== "evaluated") throw new Error(`gate rejected: ${outcome.reason}`);
	return toCandidate(outcome.result, score);
}

class CountingReservations extends ReservationSet {
	releases = 0;

	tryReserve(symbol: string): Reservation | null {
		const inner = super.tryReserve(symbol);
		if (!inner) return null;
		const count = () => {
			this.releases += 1;
		};
		return {
			symbol: inner.symbol,
			get released() {
				return inner.released;
			},
			release: () => {
				count();
				return inner.release();
			},
		};
	}
}

function engineWith(prices: number[]) {
	const gateway = new FakeExchange().addMarket("AAAUSDT").setPrices("AAAUSDT", ...prices);
	return createTestEngine({ gateway, now: NOW });
}

describe("aggressionFor", () => {
	test("picks the tier by score margin", () => {
		assert.strictEqual(aggressionFor(0.5).tailFraction, 0.35);
		assert.strictEqual(aggressionFor(0.3).tailFraction, 0.35);
		assert.strictEqual(aggressionFor(0.2).tailFraction, 0.3);
		assert.strictEqual(aggressionFor(0.05).tailFraction, 0.25);
		assert.strictEqual(aggressionFor(-0.1).tailFraction, 0.25);
	});
});

describe("touchTolerance", () => {
	test("takes the widest of the tick, wick, ATR and floor terms", () => {
		assert.ok(approx(touchTolerance(100, 0.01, 0.55, 0.2), 0.0825));
		assert.ok(approx(touchTolerance(100, 0.5, 0.55, 0.2), 1.5));
	});

	test("quiet markets get a wider floor", () => {
		assert.ok(approx(touchTolerance(100, 0.01, 0, 0.05), 0.08));
	});
});

describe("planEntry", () => {
	test("short entry a quarter into the tail at a small margin", () => {
		const plan = planEntry(candidate(shortSpike, 1.8525), 1.8, 0.01, round);
		assert.strictEqual(plan.entryPrice, 100.19);
		assert.strictEqual(plan.stopLoss, 100.39);
		assert.strictEqual(plan.takeProfit, 99.79);
		assert.strictEqual(plan.tpPct, 0.4);
		assert.ok(approx(plan.tolerance, 0.0825));
	});

	test("long entry goes deeper at a wide margin", () => {
		const plan = planEntry(candidate(longSpike, 2.115), 1.8, 0.01, round);
		assert.strictEqual(plan.tailFraction, 0.35);
		assert.strictEqual(plan.entryPrice, 99.79);
		assert.strictEqual(plan.stopLoss, 99.59);
		assert.strictEqual(plan.takeProfit, 100.29);
	});

	test("stop distance never falls under half an ATR", () => {
		const signal = candidate(shortSpike, 1.85);
		const wide = { ...signal, metrics: { ...signal.metrics, atr: 2 } };
		const plan = planEntry(wide, 1.8, 0.01, round);
		assert.strictEqual(plan.stopLoss, 101.19);
	});
});

describe("trySpawnOpen", () => {
	test("opens once the price touches the entry", async () => {
		const { ctx, notifier, tradeLog } = engineWith([100.2]);
		const signal = candidate(shortSpike, 1.8525);
		const spawn = trySpawnOpen(ctx, signal, 1.8);
		assert.strictEqual(spawn.kind, "spawned");
		assert.strictEqual(ctx.reservations.has("AAAUSDT"), true);
		if (spawn.kind === "spawned") await spawn.done;

		assert.strictEqual(ctx.positions.length, 1);
		const position = ctx.positions[0];
		assert.strictEqual(position.id, "AAAUSDT_SHORT_4080000");
		assert.strictEqual(position.id, signalId(signal));
		assert.strictEqual(position.entryBarOpenTime, 69 * MINUTE);
		assert.strictEqual(ctx.reservations.size, 0);
		assert.strictEqual(ctx.pendingOpens.size, 0);
		assert.strictEqual(ctx.cooldowns.remainingMs("AAAUSDT", NOW), config.opener.cooldownMs);
		assert.strictEqual(ctx.stats.opens, 1);
		assert.strictEqual(notifier.messages[0].split("\n")[0], "⚡ SHORT AAAUSDT");
		assert.strictEqual(tradeLog.opens[0].strategy, "wick_spike");
		assert.strictEqual(tradeLog.events[0].eventId, "OPEN_AAAUSDT_SHORT_4080000");
	});

	test("gives up when the bar after the signal closes untouched", async () => {
		const { ctx, clock } = engineWith([101]);
		const spawn = trySpawnOpen(ctx, candidate(shortSpike, 1.8525), 1.8);
		if (spawn.kind === "spawned") await spawn.done;

		assert.strictEqual(ctx.positions.length, 0);
		assert.strictEqual(ctx.stats.noTouch, 1);
		assert.strictEqual(ctx.reservations.size, 0);
		assert.ok(clock.now() <= 68 * MINUTE + 2 * MINUTE);
	});

	test("releases the reservation exactly once when the open fails", async () => {
		const { ctx, gateway } = engineWith([100.2]);
		const reservations = new CountingReservations();
		ctx.reservations = reservations;
		gateway.rejectPrecision.add("AAAUSDT");

		const spawn = trySpawnOpen(ctx, candidate(shortSpike, 1.8525), 1.8);
		if (spawn.kind === "spawned") await spawn.done;

		assert.strictEqual(ctx.stats.openFailures, 1);
		assert.strictEqual(reservations.releases, 1);
		assert.strictEqual(reservations.size, 0);
		assert.strictEqual(ctx.positions.length, 0);
	});

	test("refuses a symbol already reserved", () => {
		const { ctx } = engineWith([100.2]);
		ctx.reservations.tryReserve("AAAUSDT");
		assert.deepStrictEqual(trySpawnOpen(ctx, candidate(shortSpike, 1.9), 1.8), {
			kind: "already_reserved",
		});
	});

	test("counts reservations against capacity", () => {
		const { ctx } = engineWith([100.2]);
		ctx.reservations.tryReserve("BBBUSDT");
		const params = { ...config.opener, maxConcurrentPositions: 1 };
		const spawn = trySpawnOpen(ctx, candidate(shortSpike, 1.9), 1.8, undefined, params);
		assert.deepStrictEqual(spawn, { kind: "capacity" });
		assert.strictEqual(ctx.reservations.has("AAAUSDT"), false);
	});
});

describe("openPosition", () => {
	test("skips when a position appeared meanwhile", async () => {
		const { ctx } = engineWith([100.2]);
		const signal = candidate(shortSpike, 1.8525);
		const first = await openPosition(ctx, signal, 1.8);
		assert.strictEqual(first.kind, "opened");
		const second = await openPosition(ctx, signal, 1.8);
		assert.deepStrictEqual(second, { kind: "skipped", reason: "already_open" });
	});

	test("stops polling once aborted", async () => {
		const { ctx } = engineWith([101]);
		const controller = new AbortController();
		controller.abort();
		const result = await openPosition(ctx, candidate(shortSpike, 1.8525), 1.8, controller.signal);
		assert.deepStrictEqual(result, { kind: "skipped", reason: "aborted" });
	});

	test("respects the concurrent position cap", async () => {
		const { ctx } = engineWith([100.2]);
		const other = await openPosition(ctx, candidate(shortSpike, 1.8525), 1.8);
		assert.strictEqual(other.kind, "opened");
		if (other.kind === "opened") {
			addPosition(ctx, { ...other.position, id: "CCC", symbol: "CCCUSDT" });
		}
		ctx.gateway = new FakeExchange().addMarket("BBBUSDT").setPrices("BBBUSDT", 100.2);
		const params = { ...config.opener, maxConcurrentPositions: 2 };
		const result = await openPosition(ctx, candidate(shortSpike, 1.8525, "BBBUSDT"), 1.8, undefined, params);
		assert.deepStrictEqual(result, { kind: "skipped", reason: "capacity" });
	});
});
