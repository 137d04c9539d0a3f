import { setImmediate as yieldToLoop } from "node:timers/promises";
import {
	config,
	type FetcherConfig,
	type GateConfig,
	type OpenerConfig,
	type SchedulingConfig,
	type ScorerConfig,
	type UniverseConfig,
} from "../config";
import type { GateResult } from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { EngineContext } from "./engineContext";
import { checkEligibility, runGate, type EligibilityContext } from "./gate";
import { fetchBarsWithFallback, fetchSeriesBatch } from "./marketData";
import { trySpawnOpen } from "./opener";
import { exposure } from "./positions";
import { referenceMomentum, scoreCandidate, toCandidate, trendSlope } from "./scorer";
import { advanceRotation, buildUniverse, chunk, rotateUniverse } from "./universe";

export type ScanSettings = {
	fetcher: FetcherConfig;
	universe: UniverseConfig;
	gate: GateConfig;
	scorer: ScorerConfig;
	opener: OpenerConfig;
	scheduling: SchedulingConfig;
};

export const defaultScanSettings: ScanSettings = {
	fetcher: config.fetcher,
	universe: config.universe,
	gate: config.gate,
	scorer: config.scorer,
	opener: config.opener,
	scheduling: config.scheduling,
};

export type ScanReport = {
	startedAt: number;
	durationMs: number;
	universeSize: number;
	symbols: number;
	gatePasses: number;
	candidates: number;
	opened: number;
	vetoes: number;
	scores: number[];
	hitOpenCap: boolean;
	completed: boolean;
};

function eligibilityFor(ctx: EngineContext, now: number): EligibilityContext {
	return {
		now,
		cooldowns: ctx.cooldowns,
		exposure: (symbol) => exposure(ctx, symbol),
	};
}

/**
 * One pass over the rotated universe. Stops early on abort, on the time
 * budget, or once the per-scan open cap is reached; the rotation offset
 * advances by however many symbols were actually processed.
 */
export async function runScan(
	ctx: EngineContext,
	signal?: AbortSignal,
	settings: ScanSettings = defaultScanSettings,
): Promise<ScanReport> {
	const startedAt = ctx.clock.now();
	const universe = await buildUniverse(ctx.gateway, settings.universe);
	const rotated = rotateUniverse(
		universe.map((entry) => entry.symbol),
		ctx.rotationOffset,
	);

	const report: ScanReport = {
		startedAt,
		durationMs: 0,
		universeSize: universe.length,
		symbols: 0,
		gatePasses: 0,
		candidates: 0,
		opened: 0,
		vetoes: 0,
		scores: [],
		hitOpenCap: false,
		completed: true,
	};

	let referencePct: number | null | undefined;
	const loadReference = async (): Promise<number | null> => {
		if (referencePct === undefined) {
			const bars = await fetchBarsWithFallback(
				ctx.gateway,
				settings.universe.referenceSymbol,
				settings.gate.timeframe,
				settings.gate.barLimit,
				settings.fetcher,
			);
			referencePct = referenceMomentum(bars, settings.scorer.referenceLookback);
		}
		return referencePct;
	};

	for (const symbols of chunk(rotated, settings.universe.chunkSize)) {
		if (signal?.aborted) {
			report.completed = false;
			break;
		}
		if (ctx.clock.now() - startedAt > settings.scheduling.scanBudgetMs) {
			logger.info({ processed: report.symbols }, "Scan budget exhausted");
			report.completed = false;
			break;
		}

		const eligibility = eligibilityFor(ctx, ctx.clock.now());
		const fetchable = symbols.filter(
			(symbol) => checkEligibility(symbol, eligibility, settings.gate) === null,
		);
		const batch = await fetchSeriesBatch(
			ctx.gateway,
			fetchable,
			settings.gate.timeframe,
			settings.gate.barLimit,
			settings.fetcher,
		);

		const gateNow = eligibilityFor(ctx, ctx.clock.now());
		const passed: GateResult[] = [];
		for (const symbol of symbols) {
			try {
				const outcome = runGate(symbol, batch.get(symbol) ?? null, gateNow, settings.gate);
				if (outcome.kind === "rejected") {
					logger.debug({ symbol, reason: outcome.reason }, "Gate rejected");
				} else if (!outcome.result.passed) {
					logger.debug({ symbol, passes: outcome.result.passes }, "Gate failed");
				} else {
					passed.push(outcome.result);
				}
			} catch (error) {
				logger.debug({ symbol, error: errorMessage(error) }, "Gate evaluation failed");
			}
		}
		report.symbols += symbols.length;
		report.gatePasses += passed.length;

		if (passed.length) {
			const higher = await fetchSeriesBatch(
				ctx.gateway,
				passed.map((g) => g.symbol),
				settings.scorer.timeframe,
				settings.scorer.barLimit,
				settings.fetcher,
			);
			const referenceMomentumPct = await loadReference();

			for (const gate of passed) {
				const outcome = scoreCandidate(
					gate,
					{
						trendSlope: trendSlope(higher.get(gate.symbol) ?? null, settings.scorer),
						referenceMomentumPct,
					},
					settings.scorer,
					settings.gate,
				);
				if (outcome.kind === "vetoed") {
					report.vetoes += 1;
					logger.debug({ symbol: gate.symbol, reason: outcome.reason }, "Candidate vetoed");
					continue;
				}

				report.scores.push(outcome.score);
				const threshold = ctx.threshold.forSide(gate.side);
				if (outcome.score < threshold) continue;

				report.candidates += 1;
				const spawn = trySpawnOpen(
					ctx,
					toCandidate(gate, outcome.score),
					threshold,
					signal,
					settings.opener,
				);
				logger.info(
					{
						symbol: gate.symbol,
						side: gate.side,
						score: outcome.score,
						threshold,
						result: spawn.kind,
					},
					"Candidate accepted",
				);
				if (spawn.kind === "spawned") report.opened += 1;
				if (report.opened >= settings.opener.maxOpensPerScan) {
					report.hitOpenCap = true;
					break;
				}
			}
		}

		await yieldToLoop();
		if (report.hitOpenCap) break;
	}

	const finishedAt = ctx.clock.now();
	report.durationMs = finishedAt - startedAt;

	ctx.rotationOffset = advanceRotation(ctx.rotationOffset, report.symbols, universe.length);
	// a cancelled pass is not a sample of the market
	if (!signal?.aborted) {
		ctx.threshold.update(
			{
				scores: report.scores,
				opened: report.opened,
				vetoes: report.vetoes,
				hitOpenCap: report.hitOpenCap,
			},
			finishedAt,
		);
	}

	ctx.stats.scans += 1;
	ctx.stats.symbolsScanned += report.symbols;
	ctx.stats.gatePasses += report.gatePasses;
	ctx.stats.vetoes += report.vetoes;
	ctx.stats.lastScan = {
		startedAt,
		durationMs: report.durationMs,
		symbols: report.symbols,
		candidates: report.candidates,
		opened: report.opened,
		completed: report.completed,
	};
	await ctx.persist();

	logger.info(
		{
			symbols: report.symbols,
			universe: report.universeSize,
			gatePasses: report.gatePasses,
			candidates: report.candidates,
			opened: report.opened,
			vetoes: report.vetoes,
			durationMs: report.durationMs,
			rotationOffset: ctx.rotationOffset,
			threshold: ctx.threshold.value,
		},
		"Scan finished",
	);
	return report;
}
