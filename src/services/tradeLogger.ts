import { config } from "../config";
import type { Side } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

export type TradeEventType =
	| "OPEN"
	| "ADD"
	| "TRAIL"
	| "FREEZE"
	| "RETEST"
	| "CLOSE";

export type TradeEvent = {
	eventId: string;
	signalId: string;
	type: TradeEventType;
	symbol: string;
	side: Side;
	at: number;
	data: Record<string, number | string | boolean | null>;
};

export async function logTradeEvent(
	event: TradeEvent,
	filePath = config.paths.eventLog,
): Promise<void> {
	await appendLine(
		filePath,
		JSON.stringify({ ...event, at: new Date(event.at).toISOString() }),
	);
	logger.debug({ eventId: event.eventId, type: event.type }, "Trade event logged");
}
