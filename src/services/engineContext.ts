import type { ExchangeGateway } from "../clients/exchange";
import type { EngineSnapshot, Position } from "../types";
import { CooldownRegistry } from "./cooldowns";
import type { Notifier } from "./notifier";
import { ReservationSet } from "./reservations";
import { ThresholdController } from "./threshold";
import type { TradeLogStore } from "./tradeStore";

export type Clock = { now(): number };

export type LastScan = {
	startedAt: number;
	durationMs: number;
	symbols: number;
	candidates: number;
	opened: number;
	completed: boolean;
};

export type EngineStats = {
	scans: number;
	symbolsScanned: number;
	gatePasses: number;
	vetoes: number;
	noTouch: number;
	opens: number;
	openFailures: number;
	closes: number;
	lastScan: LastScan | null;
};

/**
 * Process-wide engine state. Write ownership: the opener writes
 * `reservations`; the position book (opener adds, lifecycle mutates/closes)
 * writes `positions`; the scanner writes `rotationOffset` and `threshold`.
 */
export type EngineContext = {
	gateway: ExchangeGateway;
	notifier: Notifier;
	tradeLog: TradeLogStore;
	clock: Clock;
	sleep(ms: number): Promise<void>;
	threshold: ThresholdController;
	reservations: ReservationSet;
	cooldowns: CooldownRegistry;
	positions: readonly Position[];
	pendingOpens: Set<Promise<void>>;
	rotationOffset: number;
	enabled: boolean;
	telegramUpdateOffset: number;
	/** Chats that sent /start; they receive notifications and may send commands. */
	subscribers: Set<string>;
	stats: EngineStats;
	persist(): Promise<void>;
};

export type EngineDependencies = {
	gateway: ExchangeGateway;
	notifier: Notifier;
	tradeLog: TradeLogStore;
	clock?: Clock;
	sleep?: (ms: number) => Promise<void>;
	persist?: (snapshot: EngineSnapshot) => Promise<void>;
};

async function defaultSleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export function emptyStats(): EngineStats {
	return {
		scans: 0,
		symbolsScanned: 0,
		gatePasses: 0,
		vetoes: 0,
		noTouch: 0,
		opens: 0,
		openFailures: 0,
		closes: 0,
		lastScan: null,
	};
}

export function createEngineContext(
	deps: EngineDependencies,
	snapshot: EngineSnapshot | null,
): EngineContext {
	const clock = deps.clock ?? { now: () => Date.now() };
	const save = deps.persist;

	const ctx: EngineContext = {
		gateway: deps.gateway,
		notifier: deps.notifier,
		tradeLog: deps.tradeLog,
		clock,
		sleep: deps.sleep ?? defaultSleep,
		threshold: new ThresholdController(snapshot?.threshold ?? null, undefined, clock.now()),
		reservations: new ReservationSet(),
		cooldowns: new CooldownRegistry(snapshot?.cooldowns ?? {}),
		positions: (snapshot?.positions ?? []).filter((p) => p.status === "ACTIVE"),
		pendingOpens: new Set(),
		rotationOffset: snapshot?.rotationOffset ?? 0,
		enabled: snapshot?.enabled ?? false,
		telegramUpdateOffset: snapshot?.telegramUpdateOffset ?? 0,
		subscribers: new Set(snapshot?.subscribers ?? []),
		stats: emptyStats(),
		persist: async () => {
			if (save) await save(toSnapshot(ctx));
		},
	};
	return ctx;
}

export function toSnapshot(ctx: EngineContext): EngineSnapshot {
	return {
		enabled: ctx.enabled,
		threshold: ctx.threshold.snapshot(),
		positions: ctx.positions.filter((p) => p.status === "ACTIVE"),
		cooldowns: ctx.cooldowns.toJSON(),
		rotationOffset: ctx.rotationOffset,
		telegramUpdateOffset: ctx.telegramUpdateOffset,
		subscribers: [...ctx.subscribers],
	};
}
