import type { Position } from "../types";
import { errorMessage, MarketDataUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { EngineContext, LastScan } from "./engineContext";
import { fetchTickerSafe } from "./marketData";
import { activePositions, closePosition, findActive } from "./positions";
import { ScanScheduler } from "./scheduler";
import type { Strategy, StrategyName, StrategyParameters } from "./strategies";

export type EngineStatus = {
	running: boolean;
	strategy: StrategyName;
	activePositions: number;
	maxPositions: number;
	reservations: number;
	threshold: number;
	longThreshold: number;
	lastScan: LastScan | null;
	rotationOffset: number;
	parameters: StrategyParameters;
	positions: Array<Pick<Position, "symbol" | "side" | "takeProfit" | "stopLoss" | "openedAt">>;
};

export type SchedulerFactory = (ctx: EngineContext, strategy: Strategy) => ScanScheduler;

export class EngineController {
	private scheduler: ScanScheduler | null = null;
	private prepared = false;

	constructor(
		private readonly ctx: EngineContext,
		private readonly strategy: Strategy,
		private readonly createScheduler: SchedulerFactory = (ctx, strategy) =>
			new ScanScheduler(ctx, strategy),
	) {}

	get running(): boolean {
		return this.scheduler?.isRunning ?? false;
	}

	/** Starts the scheduler; false when it was already running. */
	async enable(): Promise<boolean> {
		if (this.running) return false;
		if (!this.prepared) {
			await this.strategy.prepare(this.ctx);
			this.prepared = true;
		}
		this.ctx.enabled = true;
		await this.ctx.persist();
		this.scheduler = this.createScheduler(this.ctx, this.strategy);
		this.scheduler.start();
		logger.info({ strategy: this.strategy.name }, "Engine enabled");
		return true;
	}

	async disable(): Promise<boolean> {
		const wasRunning = this.running;
		this.ctx.enabled = false;
		await this.halt();
		await this.ctx.persist();
		if (wasRunning) logger.info({ strategy: this.strategy.name }, "Engine disabled");
		return wasRunning;
	}

	/** Stops work without clearing the persisted enabled flag. */
	async shutdown(): Promise<void> {
		await this.halt();
		await this.ctx.persist();
		await this.ctx.gateway.close();
	}

	private async halt(): Promise<void> {
		const scheduler = this.scheduler;
		this.scheduler = null;
		if (scheduler) await scheduler.stop();
	}

	status(): EngineStatus {
		const positions = activePositions(this.ctx);
		return {
			running: this.running,
			strategy: this.strategy.name,
			activePositions: positions.length,
			maxPositions: this.strategy.maxPositions(),
			reservations: this.ctx.reservations.size,
			threshold: this.ctx.threshold.forSide("SHORT"),
			longThreshold: this.ctx.threshold.forSide("LONG"),
			lastScan: this.ctx.stats.lastScan,
			rotationOffset: this.ctx.rotationOffset,
			parameters: this.strategy.describe(),
			positions: positions.map((p) => ({
				symbol: p.symbol,
				side: p.side,
				takeProfit: p.takeProfit,
				stopLoss: p.stopLoss,
				openedAt: p.openedAt,
			})),
		};
	}

	/** Closes at the live price; null when the symbol has no active position. */
	async forceClose(symbol: string): Promise<Position | null> {
		const position = findActive(this.ctx, symbol);
		if (!position) return null;
		const ticker = await fetchTickerSafe(this.ctx.gateway, symbol);
		if (!ticker) throw new MarketDataUnavailableError(symbol, "ticker");
		return closePosition(this.ctx, position.id, ticker.last, "MANUAL");
	}

	async forceCloseAll(): Promise<{ closed: Position[]; failed: string[] }> {
		const closed: Position[] = [];
		const failed: string[] = [];
		for (const position of activePositions(this.ctx)) {
			try {
				const result = await this.forceClose(position.symbol);
				if (result) closed.push(result);
			} catch (error) {
				logger.warn(
					{ symbol: position.symbol, error: errorMessage(error) },
					"Force close failed",
				);
				failed.push(position.symbol);
			}
		}
		return { closed, failed };
	}
}
