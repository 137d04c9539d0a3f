import { config } from "../config";
import type { EngineSnapshot, Position, ThresholdState } from "../types";
import { errorMessage, isRecord } from "../utils/errors";
import { logger } from "../utils/logger";
import { createWriteQueue, readJson, writeJson } from "../utils/storage";
import { initialThreshold } from "./threshold";

function restoreThreshold(raw: unknown, now: number): ThresholdState {
	if (
		isRecord(raw) &&
		typeof raw.value === "number" &&
		Number.isFinite(raw.value)
	) {
		return {
			value: raw.value,
			updatedAt: typeof raw.updatedAt === "number" ? raw.updatedAt : now,
			lastDelta: typeof raw.lastDelta === "number" ? raw.lastDelta : 0,
		};
	}
	return initialThreshold(now);
}

function restoreCooldowns(raw: unknown): Record<string, number> {
	const cooldowns: Record<string, number> = {};
	if (!isRecord(raw)) return cooldowns;
	for (const [symbol, until] of Object.entries(raw)) {
		if (typeof until === "number" && Number.isFinite(until)) {
			cooldowns[symbol] = until;
		}
	}
	return cooldowns;
}

function finite(value: unknown): value is number {
	return typeof value === "number" && Number.isFinite(value);
}

function finiteFields(raw: Record<string, unknown>, keys: readonly string[]): boolean {
	return keys.every((key) => finite(raw[key]));
}

const BASE_NUMBERS = [
	"openedAt",
	"entryBarOpenTime",
	"leverage",
	"takeProfit",
	"maxFavorablePrice",
	"maxAdversePrice",
] as const;

const SCALP_NUMBERS = [
	"entryPrice",
	"stopLoss",
	"sizeUsdt",
	"score",
	"lastEvaluatedBarOpenTime",
] as const;

const DCA_NUMBERS = ["growth", "quantity", "averagePrice", "trailingStage"] as const;

function isNumberList(value: unknown): value is number[] {
	return Array.isArray(value) && value.every(finite);
}

function isDcaStep(raw: unknown): boolean {
	return (
		isRecord(raw) &&
		finiteFields(raw, ["price", "quantity", "margin", "filledAt"]) &&
		typeof raw.retest === "boolean"
	);
}

/** Accepts only records that can still be priced and exited. */
function isPosition(raw: unknown): raw is Position {
	if (
		!isRecord(raw) ||
		typeof raw.id !== "string" ||
		typeof raw.symbol !== "string" ||
		(raw.side !== "LONG" && raw.side !== "SHORT") ||
		raw.status !== "ACTIVE" ||
		!finiteFields(raw, BASE_NUMBERS)
	) {
		return false;
	}
	if (raw.kind === "scalp") return finiteFields(raw, SCALP_NUMBERS);
	if (raw.kind !== "dca") return false;
	return (
		finiteFields(raw, DCA_NUMBERS) &&
		(raw.stopLoss === null || finite(raw.stopLoss)) &&
		isNumberList(raw.stepMargins) &&
		isNumberList(raw.ladder) &&
		Array.isArray(raw.steps) &&
		raw.steps.every(isDcaStep) &&
		typeof raw.frozen === "boolean" &&
		typeof raw.reservedFinalStep === "boolean"
	);
}

export async function loadSnapshot(
	filePath = config.paths.engineState,
	now = Date.now(),
): Promise<EngineSnapshot | null> {
	const stored = await readJson<unknown>(filePath, null);
	if (!isRecord(stored)) return null;

	const positions = Array.isArray(stored.positions)
		? stored.positions.filter(isPosition)
		: [];
	const snapshot: EngineSnapshot = {
		enabled: stored.enabled === true,
		threshold: restoreThreshold(stored.threshold, now),
		positions,
		cooldowns: restoreCooldowns(stored.cooldowns),
		rotationOffset:
			typeof stored.rotationOffset === "number" && stored.rotationOffset >= 0
				? Math.floor(stored.rotationOffset)
				: 0,
		telegramUpdateOffset:
			typeof stored.telegramUpdateOffset === "number"
				? stored.telegramUpdateOffset
				: 0,
		subscribers: Array.isArray(stored.subscribers)
			? stored.subscribers.filter((chat): chat is string => typeof chat === "string")
			: [],
	};

	logger.info(
		{
			enabled: snapshot.enabled,
			threshold: snapshot.threshold.value,
			positions: positions.length,
			cooldowns: Object.keys(snapshot.cooldowns).length,
			subscribers: snapshot.subscribers.length,
		},
		"Engine state loaded",
	);
	return snapshot;
}

/** Serialized snapshot writer; failures are logged, never thrown. */
export function createSnapshotWriter(
	filePath = config.paths.engineState,
): (snapshot: EngineSnapshot) => Promise<void> {
	const enqueue = createWriteQueue();
	return async (snapshot) => {
		try {
			await enqueue(() => writeJson(filePath, snapshot));
		} catch (error) {
			logger.warn({ error: errorMessage(error) }, "Failed to save engine state");
		}
	};
}
