import { sendTelegramMessage } from "../clients/telegram";
import { config } from "../config";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export interface Notifier {
	send(text: string): Promise<void>;
}

export type ChatSender = (text: string, chatId: string) => Promise<void>;

/**
 * Broadcasts to the configured chat and every subscribed one. A chat that
 * cannot be reached is logged and skipped; the rest still get the message.
 */
export function createTelegramNotifier(
	subscribers: () => Iterable<string>,
	deliver: ChatSender = sendTelegramMessage,
	configuredChat = config.telegram.chatId,
): Notifier {
	return {
		async send(text) {
			const chats = new Set([configuredChat, ...subscribers()].filter(Boolean));
			for (const chatId of chats) {
				try {
					await deliver(text, chatId);
				} catch (error) {
					logger.warn({ chatId, error: errorMessage(error) }, "Telegram delivery failed");
				}
			}
		},
	};
}

/** Delivery failures are logged and dropped; trading never waits on a retry. */
export async function notify(notifier: Notifier, text: string): Promise<void> {
	try {
		await notifier.send(text);
	} catch (error) {
		logger.warn({ error: errorMessage(error) }, "Notification failed");
	}
}
