import { telegramConfigured } from "./clients/telegram";
import { BinanceGateway } from "./clients/binance";
import { config } from "./config";
import { CommandPoller } from "./services/commands";
import { EngineController } from "./services/controller";
import { createEngineContext } from "./services/engineContext";
import { createSnapshotWriter, loadSnapshot } from "./services/engineState";
import { createTelegramNotifier, notify } from "./services/notifier";
import { createStrategy } from "./services/strategies";
import { JsonTradeLogStore } from "./services/tradeStore";
import { errorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

async function bootstrap() {
	logger.info({ strategy: config.engine.strategy }, "Starting spike scanner");

	const snapshot = await loadSnapshot();
	const ctx = createEngineContext(
		{
			gateway: new BinanceGateway(),
			notifier: createTelegramNotifier(() => ctx.subscribers),
			tradeLog: new JsonTradeLogStore(),
			persist: createSnapshotWriter(),
		},
		snapshot,
	);
	const controller = new EngineController(ctx, createStrategy());

	let poller: CommandPoller | null = null;
	if (telegramConfigured()) {
		poller = new CommandPoller(ctx, controller);
		poller.start();
	} else {
		logger.warn("Telegram not configured; command polling disabled");
	}

	if (snapshot?.enabled) {
		try {
			await controller.enable();
		} catch (error) {
			await poller?.stop();
			throw error;
		}
		await notify(
			ctx.notifier,
			`Engine resumed with ${ctx.positions.length} active position(s)`,
		);
	}

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		logger.info({ signal }, "Shutting down");
		Promise.all([controller.shutdown(), poller?.stop()])
			.then(() => logger.info("Shutdown complete"))
			.catch((error: unknown) => {
				logger.error({ error: errorMessage(error) }, "Shutdown failed");
				process.exitCode = 1;
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
