import {
	fetchTelegramUpdates,
	sendTelegramMessage,
	type TelegramCommandMessage,
} from "../clients/telegram";
import { config } from "../config";
import { errorMessage } from "../utils/errors";
import { formatPrice, formatSigned } from "../utils/format";
import { logger } from "../utils/logger";
import type { EngineController, EngineStatus } from "./controller";
import type { EngineContext } from "./engineContext";

export function formatStatus(status: EngineStatus): string {
	const lines = [
		`Engine: ${status.running ? "RUNNING" : "STOPPED"} (${status.strategy})`,
		`Positions: ${status.activePositions}/${status.maxPositions} | Reservations: ${status.reservations}`,
		`Threshold: ${status.threshold.toFixed(2)} short / ${status.longThreshold.toFixed(2)} long`,
		`Rotation offset: ${status.rotationOffset}`,
	];
	if (status.lastScan) {
		const scan = status.lastScan;
		lines.push(
			`Last scan: ${scan.symbols} symbols in ${(scan.durationMs / 1000).toFixed(1)}s, ${scan.candidates} candidates, ${scan.opened} opened${scan.completed ? "" : " (partial)"}`,
		);
	}
	for (const p of status.positions) {
		lines.push(
			`• ${p.symbol} ${p.side} TP ${formatPrice(p.takeProfit)} SL ${formatPrice(p.stopLoss)}`,
		);
	}
	const params = Object.entries(status.parameters)
		.map(([key, value]) => `${key}=${value}`)
		.join(", ");
	lines.push(`Params: ${params}`);
	return lines.join("\n");
}

const HELP = "Commands: /start, /run, /stop, /status, /close SYMBOL, /closeall, /threshold";

/** `/Close@bot AAA` → `/close`; null for plain text. */
function commandOf(text: string): string | null {
	const [head = ""] = text.trim().split(/\s+/);
	if (!head.startsWith("/")) return null;
	return head.split("@")[0].toLowerCase();
}

/** Reply text for one chat message; null when the message is not a command. */
export async function handleCommand(
	controller: EngineController,
	text: string,
): Promise<string | null> {
	const command = commandOf(text);
	if (command === null) return null;
	const arg = text.trim().split(/\s+/)[1];

	try {
		switch (command) {
			case "/run":
				return (await controller.enable()) ? "Engine started" : "Engine already running";
			case "/stop":
				return (await controller.disable()) ? "Engine stopped" : "Engine was not running";
			case "/status":
				return formatStatus(controller.status());
			case "/threshold": {
				const { threshold, longThreshold } = controller.status();
				return `Threshold: ${threshold.toFixed(2)} short / ${longThreshold.toFixed(2)} long`;
			}
			case "/close": {
				if (!arg) return "Usage: /close SYMBOL";
				const symbol = arg.toUpperCase();
				const closed = await controller.forceClose(symbol);
				if (!closed) return `No active position on ${symbol}`;
				return `Closed ${symbol} at ${formatPrice(closed.exitPrice)} (${formatSigned(closed.pnlUsd ?? 0)} USDT)`;
			}
			case "/closeall": {
				const { closed, failed } = await controller.forceCloseAll();
				const suffix = failed.length ? `; failed: ${failed.join(", ")}` : "";
				return `Closed ${closed.length} position(s)${suffix}`;
			}
			default:
				return HELP;
		}
	} catch (error) {
		logger.warn({ command, error: errorMessage(error) }, "Command failed");
		return `Command failed: ${errorMessage(error)}`;
	}
}

export type UpdateSource = (
	offset: number,
	signal: AbortSignal,
) => Promise<{ messages: TelegramCommandMessage[]; nextOffset: number }>;

export type ReplySink = (text: string, chatId: string) => Promise<void>;

/**
 * Long-polls chat updates. `/start` subscribes any chat; other commands are
 * answered for the configured chat and subscribers only. The update offset
 * is persisted so a restart does not replay them.
 */
export class CommandPoller {
	private readonly abort = new AbortController();
	private loop: Promise<void> | null = null;

	constructor(
		private readonly ctx: EngineContext,
		private readonly controller: EngineController,
		private readonly chatId = config.telegram.chatId,
		private readonly fetchUpdates: UpdateSource = fetchTelegramUpdates,
		private readonly reply: ReplySink = sendTelegramMessage,
		private readonly errorCooldownMs = config.engine.loopErrorCooldownMs,
	) {}

	start(): void {
		if (this.loop) return;
		this.loop = this.run();
	}

	async stop(): Promise<void> {
		this.abort.abort();
		await this.loop;
		this.loop = null;
	}

	async pollOnce(): Promise<number> {
		const { messages, nextOffset } = await this.fetchUpdates(
			this.ctx.telegramUpdateOffset,
			this.abort.signal,
		);
		let handled = 0;
		for (const message of messages) {
			let answer: string | null;
			if (commandOf(message.text) === "/start") {
				answer = await this.subscribe(message.chatId);
			} else if (this.accepts(message.chatId)) {
				answer = await handleCommand(this.controller, message.text);
			} else {
				logger.debug({ chatId: message.chatId }, "Ignoring message from unknown chat");
				continue;
			}
			if (answer === null) continue;
			handled += 1;
			try {
				await this.reply(answer, message.chatId);
			} catch (error) {
				logger.warn({ chatId: message.chatId, error: errorMessage(error) }, "Command reply failed");
			}
		}
		if (nextOffset !== this.ctx.telegramUpdateOffset) {
			this.ctx.telegramUpdateOffset = nextOffset;
			await this.ctx.persist();
		}
		return handled;
	}

	private accepts(chatId: string): boolean {
		return chatId === this.chatId || this.ctx.subscribers.has(chatId);
	}

	private async subscribe(chatId: string): Promise<string> {
		if (this.accepts(chatId)) return "Already subscribed. Use /run to start the engine.";
		this.ctx.subscribers.add(chatId);
		logger.info({ chatId }, "Chat subscribed");
		await this.ctx.persist();
		return "Subscribed to engine notifications. Use /run to start the engine.";
	}

	private async run(): Promise<void> {
		while (!this.abort.signal.aborted) {
			try {
				await this.pollOnce();
			} catch (error) {
				if (this.abort.signal.aborted) break;
				logger.warn({ error: errorMessage(error) }, "Command polling failed");
				await this.ctx.sleep(this.errorCooldownMs);
			}
		}
	}
}
