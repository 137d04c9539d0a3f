import { config } from "../config";
import type { TradeCloseFields, TradeOpenRecord, TradeRecord } from "../types";
import { logger } from "../utils/logger";
import { createWriteQueue, readJson, writeJson } from "../utils/storage";
import { logTradeEvent, type TradeEvent } from "./tradeLogger";

/** Append/update trade log, idempotent on signal id. */
export interface TradeLogStore {
	recordOpen(record: TradeOpenRecord): Promise<void>;
	recordClose(signalId: string, fields: TradeCloseFields): Promise<void>;
	recordEvent(event: TradeEvent): Promise<void>;
}

type TradeTable = Record<string, TradeRecord>;

export class JsonTradeLogStore implements TradeLogStore {
	private readonly enqueue = createWriteQueue();

	constructor(
		private readonly filePath = config.paths.tradeLog,
		private readonly eventLogPath = config.paths.eventLog,
	) {}

	async load(): Promise<TradeTable> {
		return readJson<TradeTable>(this.filePath, {});
	}

	recordOpen(record: TradeOpenRecord): Promise<void> {
		return this.enqueue(async () => {
			const table = await this.load();
			if (table[record.signalId]) {
				logger.debug({ signalId: record.signalId }, "Open already recorded");
				return;
			}
			table[record.signalId] = { ...record, status: "ACTIVE" };
			await writeJson(this.filePath, table);
			logger.info(
				{ signalId: record.signalId, symbol: record.symbol },
				"Trade recorded",
			);
		});
	}

	recordClose(signalId: string, fields: TradeCloseFields): Promise<void> {
		return this.enqueue(async () => {
			const table = await this.load();
			const existing = table[signalId];
			if (!existing) {
				logger.warn({ signalId }, "Close for unknown trade; skipping");
				return;
			}
			table[signalId] = { ...existing, ...fields, status: "CLOSED" };
			await writeJson(this.filePath, table);
			logger.info({ signalId, pnlUsd: fields.pnlUsd }, "Closed trade in store");
		});
	}

	recordEvent(event: TradeEvent): Promise<void> {
		return logTradeEvent(event, this.eventLogPath);
	}
}
