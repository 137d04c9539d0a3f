import assert from "node:assert";
import { describe, test } from "node:test";
import { createTelegramNotifier, notify } from "../src/services/notifier";

describe("createTelegramNotifier", () => {
	test("sends to the configured chat and each subscriber once", async () => {
		const sent: Array<{ text: string; chatId: string }> = [];
		const subscribers = new Set(["7", "42"]);
		const notifier = createTelegramNotifier(
			() => subscribers,
			async (text, chatId) => {
				sent.push({ text, chatId });
			},
			"42",
		);

		await notifier.send("hello");
		assert.deepStrictEqual(sent, [
			{ text: "hello", chatId: "42" },
			{ text: "hello", chatId: "7" },
		]);
	});

	test("one unreachable chat does not block the others", async () => {
		const sent: string[] = [];
		const notifier = createTelegramNotifier(
			() => ["7", "8"],
			async (_text, chatId) => {
				if (chatId === "7") throw new Error("bot was blocked by the user");
				sent.push(chatId);
			},
			"",
		);

		await notify(notifier, "hello");
		assert.deepStrictEqual(sent, ["8"]);
	});

	test("subscribers added later receive later messages", async () => {
		const sent: string[] = [];
		const subscribers = new Set<string>();
		const notifier = createTelegramNotifier(
			() => subscribers,
			async (_text, chatId) => {
				sent.push(chatId);
			},
			"42",
		);

		await notifier.send("first");
		subscribers.add("99");
		await notifier.send("second");
		assert.deepStrictEqual(sent, ["42", "42", "99"]);
	});
});
