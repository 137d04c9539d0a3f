import assert from "node:assert";
import { describe, test } from "node:test";
import type { TelegramCommandMessage } from "../src/clients/telegram";
import { CommandPoller, handleCommand } from "../src/services/commands";
import { EngineController } from "../src/services/controller";
import { addPosition } from "../src/services/positions";
import { ScanScheduler } from "../src/services/scheduler";
import type { ScalpPosition } from "../src/types";
import { createTestEngine } from "./helpers/engine";
import { FakeExchange } from "./helpers/fakeExchange";
import { FakeStrategy } from "./helpers/strategy";

function position(symbol: string): ScalpPosition {
	return {
		kind: "scalp",
		id: `${symbol}_LONG_0`,
		symbol,
		side: "LONG",
		status: "ACTIVE",
		openedAt: 0,
		entryBarOpenTime: 0,
		lastEvaluatedBarOpenTime: 0,
		leverage: 20,
		entryPrice: 100,
		stopLoss: 99.8,
		takeProfit: 100.3,
		sizeUsdt: 10,
		score: 2,
		maxFavorablePrice: 100,
		maxAdversePrice: 100,
	};
}

function setup() {
	const gateway = new FakeExchange().addMarket("AAAUSDT").addMarket("CCCUSDT");
	const engine = createTestEngine({ gateway, now: 60_000 });
	const strategy = new FakeStrategy();
	const controller = new EngineController(
		engine.ctx,
		strategy,
		(ctx, s) =>
			new ScanScheduler(ctx, s, {
				monitorTickMs: 1_000,
				loopErrorCooldownMs: 1_000,
				scanIntervalMs: 30_000,
				housekeepingCron: null,
				timezone: "UTC",
			}),
	);
	return { ...engine, strategy, controller };
}

describe("handleCommand", () => {
	test("ignores plain chat", async () => {
		const { controller } = setup();
		assert.strictEqual(await handleCommand(controller, "hello"), null);
	});

	test("run and stop toggle the engine", async () => {
		const { controller, ctx, strategy } = setup();
		assert.strictEqual(await handleCommand(controller, "/RUN@spike_bot"), "Engine started");
		assert.strictEqual(ctx.enabled, true);
		assert.strictEqual(await handleCommand(controller, "/run"), "Engine already running");
		assert.strictEqual(await handleCommand(controller, "/stop"), "Engine stopped");
		assert.strictEqual(ctx.enabled, false);
		assert.strictEqual(await handleCommand(controller, "/stop"), "Engine was not running");
		assert.strictEqual(await handleCommand(controller, "/run"), "Engine started");
		assert.strictEqual(strategy.prepares, 1);
		await controller.shutdown();
	});

	test("a failed prepare keeps the engine stopped", async () => {
		const { controller, ctx, strategy } = setup();
		strategy.prepareError = new Error("Symbol BTCUSDT is not listed on the exchange");
		assert.strictEqual(
			await handleCommand(controller, "/run"),
			"Command failed: Symbol BTCUSDT is not listed on the exchange",
		);
		assert.strictEqual(ctx.enabled, false);
		assert.strictEqual(controller.running, false);
	});

	test("threshold reports both sides", async () => {
		const { controller } = setup();
		assert.strictEqual(
			await handleCommand(controller, "/threshold"),
			"Threshold: 1.80 short / 1.90 long",
		);
	});

	test("status summarizes the engine", async () => {
		const { controller, ctx } = setup();
		addPosition(ctx, position("AAAUSDT"));
		const lines = (await handleCommand(controller, "/status"))?.split("\n") ?? [];
		assert.strictEqual(lines[0], "Engine: STOPPED (wick_spike)");
		assert.strictEqual(lines[1], "Positions: 1/10 | Reservations: 0");
		assert.strictEqual(lines[4], "• AAAUSDT LONG TP 100.3000 SL 99.8000");
		assert.strictEqual(lines[5], "Params: timeframe=1m, leverage=20");
	});

	test("close settles at the live price", async () => {
		const { controller, ctx, gateway } = setup();
		addPosition(ctx, position("AAAUSDT"));
		gateway.setPrices("AAAUSDT", 99.9);
		assert.strictEqual(await handleCommand(controller, "/close"), "Usage: /close SYMBOL");
		assert.strictEqual(
			await handleCommand(controller, "/close bbbusdt"),
			"No active position on BBBUSDT",
		);
		assert.strictEqual(
			await handleCommand(controller, "/close aaausdt"),
			"Closed AAAUSDT at 99.9000 (-0.20 USDT)",
		);
		assert.strictEqual(ctx.positions.length, 0);
	});

	test("close without a price reports the failure", async () => {
		const { controller, ctx } = setup();
		addPosition(ctx, position("AAAUSDT"));
		assert.strictEqual(
			await handleCommand(controller, "/close AAAUSDT"),
			"Command failed: Market data unavailable for AAAUSDT (ticker)",
		);
		assert.strictEqual(ctx.positions.length, 1);
	});

	test("closeall lists what could not be closed", async () => {
		const { controller, ctx, gateway } = setup();
		addPosition(ctx, position("AAAUSDT"));
		addPosition(ctx, position("CCCUSDT"));
		gateway.setPrices("AAAUSDT", 100.1);
		assert.strictEqual(
			await handleCommand(controller, "/closeall"),
			"Closed 1 position(s); failed: CCCUSDT",
		);
	});

	test("unknown commands get the help text", async () => {
		const { controller } = setup();
		assert.strictEqual(
			await handleCommand(controller, "/help"),
			"Commands: /start, /run, /stop, /status, /close SYMBOL, /closeall, /threshold",
		);
	});
});

describe("CommandPoller", () => {
	test("answers the configured chat and persists the offset", async () => {
		const { controller, ctx, snapshots } = setup();
		const offsets: number[] = [];
		const replies: Array<{ text: string; chatId: string }> = [];
		const messages: TelegramCommandMessage[] = [
			{ updateId: 10, chatId: "42", text: "/threshold" },
			{ updateId: 11, chatId: "99", text: "/run" },
			{ updateId: 12, chatId: "42", text: "thanks" },
		];
		const poller = new CommandPoller(
			ctx,
			controller,
			"42",
			async (offset) => {
				offsets.push(offset);
				return { messages: offsets.length === 1 ? messages : [], nextOffset: 13 };
			},
			async (text, chatId) => {
				replies.push({ text, chatId });
			},
		);

		assert.strictEqual(await poller.pollOnce(), 1);
		assert.deepStrictEqual(replies, [
			{ text: "Threshold: 1.80 short / 1.90 long", chatId: "42" },
		]);
		assert.strictEqual(ctx.enabled, false);
		assert.strictEqual(ctx.telegramUpdateOffset, 13);
		assert.strictEqual(snapshots.length, 1);

		assert.strictEqual(await poller.pollOnce(), 0);
		assert.deepStrictEqual(offsets, [0, 13]);
		assert.strictEqual(snapshots.length, 1);
	});

	test("/start subscribes a new chat, which may then send commands", async () => {
		const { controller, ctx, snapshots } = setup();
		const replies: Array<{ text: string; chatId: string }> = [];
		const messages: TelegramCommandMessage[] = [
			{ updateId: 20, chatId: "99", text: "/threshold" },
			{ updateId: 21, chatId: "99", text: "/start@spike_bot" },
			{ updateId: 22, chatId: "99", text: "/threshold" },
			{ updateId: 23, chatId: "99", text: "/start" },
			{ updateId: 24, chatId: "42", text: "/start" },
		];
		const poller = new CommandPoller(
			ctx,
			controller,
			"42",
			async () => ({ messages, nextOffset: 25 }),
			async (text, chatId) => {
				replies.push({ text, chatId });
			},
		);

		assert.strictEqual(await poller.pollOnce(), 4);
		assert.deepStrictEqual(replies, [
			{ text: "Subscribed to engine notifications. Use /run to start the engine.", chatId: "99" },
			{ text: "Threshold: 1.80 short / 1.90 long", chatId: "99" },
			{ text: "Already subscribed. Use /run to start the engine.", chatId: "99" },
			{ text: "Already subscribed. Use /run to start the engine.", chatId: "42" },
		]);
		assert.deepStrictEqual([...ctx.subscribers], ["99"]);
		assert.strictEqual(snapshots.length, 2);
		assert.deepStrictEqual(snapshots[0].subscribers, ["99"]);
	});

	test("stop ends the polling loop", async () => {
		const { controller, ctx } = setup();
		const poller = new CommandPoller(
			ctx,
			controller,
			"42",
			(_offset, signal) =>
				new Promise<{ messages: TelegramCommandMessage[]; nextOffset: number }>((_resolve, reject) => {
					signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
				}),
			async () => undefined,
		);
		poller.start();
		await poller.stop();
	});
});
