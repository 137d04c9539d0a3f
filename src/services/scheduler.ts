import cron, { type ScheduledTask } from "node-cron";
import { config } from "../config";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { EngineContext } from "./engineContext";
import { activePositions } from "./positions";
import type { Strategy } from "./strategies";

export type SchedulerOptions = {
	monitorTickMs: number;
	loopErrorCooldownMs: number;
	scanIntervalMs: number;
	housekeepingCron: string | null;
	timezone: string;
};

const defaultOptions: SchedulerOptions = {
	monitorTickMs: config.engine.monitorTickMs,
	loopErrorCooldownMs: config.engine.loopErrorCooldownMs,
	scanIntervalMs: config.scheduling.scanIntervalMs,
	housekeepingCron: config.engine.housekeepingCron,
	timezone: config.engine.timezone,
};

/**
 * Drives the strategy while the engine is enabled: scans run in the
 * background at most one at a time, the position monitor runs every tick
 * regardless. Every scan, and every open it spawns, shares one lifecycle
 * signal that `stop()` aborts.
 */
export class ScanScheduler {
	private running = false;
	private loop: Promise<void> | null = null;
	private scan: Promise<void> | null = null;
	private lifecycle = new AbortController();
	private lastScanStartedAt = Number.NEGATIVE_INFINITY;
	private housekeeping: ScheduledTask | null = null;

	constructor(
		private readonly ctx: EngineContext,
		private readonly strategy: Strategy,
		private readonly options: SchedulerOptions = defaultOptions,
	) {}

	get isRunning(): boolean {
		return this.running;
	}

	get scanInFlight(): boolean {
		return this.scan !== null;
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		if (this.lifecycle.signal.aborted) this.lifecycle = new AbortController();
		if (this.options.housekeepingCron) {
			this.housekeeping = cron.schedule(
				this.options.housekeepingCron,
				() => {
					this.housekeep().catch((error: unknown) => {
						logger.error({ error: errorMessage(error) }, "Housekeeping failed");
					});
				},
				{ timezone: this.options.timezone },
			);
		}
		this.loop = this.runLoop();
		logger.info(
			{ strategy: this.strategy.name, scanIntervalMs: this.options.scanIntervalMs },
			"Scheduler started",
		);
	}

	private async runLoop(): Promise<void> {
		while (this.running && this.ctx.enabled) {
			try {
				await this.tick();
			} catch (error) {
				logger.error({ error: errorMessage(error) }, "Scheduler loop failed");
				await this.ctx.sleep(this.options.loopErrorCooldownMs);
				continue;
			}
			await this.ctx.sleep(this.options.monitorTickMs);
		}
		this.running = false;
	}

	/** Launches a scan when none is running and the cadence allows, then monitors. */
	async tick(): Promise<void> {
		const now = this.ctx.clock.now();
		if (!this.scan && now - this.lastScanStartedAt >= this.options.scanIntervalMs) {
			this.launchScan(now);
		}
		await this.strategy.monitor(this.ctx);
	}

	private launchScan(now: number): void {
		this.lastScanStartedAt = now;
		const done: Promise<void> = this.strategy
			.scan(this.ctx, this.lifecycle.signal)
			.catch((error: unknown) => {
				logger.error({ error: errorMessage(error) }, "Scan failed");
			})
			.finally(() => {
				if (this.scan === done) this.scan = null;
			});
		this.scan = done;
	}

	/** Cancels the scan and every pending open, then waits for them to settle. */
	async stop(): Promise<void> {
		this.running = false;
		this.housekeeping?.stop();
		this.housekeeping = null;

		this.lifecycle.abort();
		if (this.scan) await this.scan;
		await Promise.allSettled([...this.ctx.pendingOpens]);
		await this.loop;
		this.loop = null;
		logger.info({ strategy: this.strategy.name }, "Scheduler stopped");
	}

	async housekeep(): Promise<void> {
		const now = this.ctx.clock.now();
		const purged = this.ctx.cooldowns.purge(now);
		const { stats } = this.ctx;
		logger.info(
			{
				scans: stats.scans,
				symbolsScanned: stats.symbolsScanned,
				gatePasses: stats.gatePasses,
				vetoes: stats.vetoes,
				noTouch: stats.noTouch,
				opens: stats.opens,
				closes: stats.closes,
				active: activePositions(this.ctx).length,
				reservations: this.ctx.reservations.size,
				cooldowns: this.ctx.cooldowns.size,
				purged,
				threshold: this.ctx.threshold.value,
				scanInFlight: this.scanInFlight,
			},
			"Heartbeat",
		);
		await this.ctx.persist();
	}
}
