import axios from "axios";
import { config } from "../config";
import { isRecord } from "../utils/errors";
import { logger } from "../utils/logger";

export type TelegramCommandMessage = {
	updateId: number;
	chatId: string;
	text: string;
};

function apiUrl(method: string): string {
	return `https://api.telegram.org/bot${config.telegram.botToken}/${method}`;
}

export function telegramConfigured(): boolean {
	return Boolean(config.telegram.botToken);
}

export async function sendTelegramMessage(
	text: string,
	chatId = config.telegram.chatId,
): Promise<void> {
	if (!config.telegram.botToken || !chatId) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	await axios.post(apiUrl("sendMessage"), {
		chat_id: chatId,
		text,
		disable_web_page_preview: true,
	});
}

function parseUpdate(raw: unknown): TelegramCommandMessage | null {
	if (!isRecord(raw) || typeof raw.update_id !== "number") return null;
	const message = raw.message;
	if (!isRecord(message) || typeof message.text !== "string") return null;
	const chat = message.chat;
	if (!isRecord(chat) || typeof chat.id !== "number") return null;
	return { updateId: raw.update_id, chatId: String(chat.id), text: message.text };
}

/** Long-polls getUpdates; returns parsed text messages and the next offset. */
export async function fetchTelegramUpdates(
	offset: number,
	signal?: AbortSignal,
	timeoutSec = config.telegram.pollTimeoutSec,
): Promise<{ messages: TelegramCommandMessage[]; nextOffset: number }> {
	const response = await axios.get<unknown>(apiUrl("getUpdates"), {
		params: { offset, timeout: timeoutSec, allowed_updates: '["message"]' },
		timeout: (timeoutSec + 10) * 1000,
		signal,
	});

	const body = response.data;
	const results = isRecord(body) && Array.isArray(body.result) ? body.result : [];
	let nextOffset = offset;
	const messages: TelegramCommandMessage[] = [];
	for (const raw of results) {
		if (isRecord(raw) && typeof raw.update_id === "number") {
			nextOffset = Math.max(nextOffset, raw.update_id + 1);
		}
		const parsed = parseUpdate(raw);
		if (parsed) messages.push(parsed);
	}
	return { messages, nextOffset };
}
