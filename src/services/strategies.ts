import { config } from "../config";
import { SymbolNotFoundError } from "../utils/errors";
import { createDcaStrategy } from "./dca/strategy";
import type { EngineContext } from "./engineContext";
import { fetchWithRetry } from "./marketData";
import { monitorScalpPositions } from "./positionMonitor";
import { runScan, type ScanSettings, defaultScanSettings } from "./scanner";

export type StrategyName = "wick_spike" | "dca";

export type StrategyParameters = Record<string, number | string>;

export interface Strategy {
	readonly name: StrategyName;
	/** Resolves exchange prerequisites; throws when the engine must not start. */
	prepare(ctx: EngineContext): Promise<void>;
	scan(ctx: EngineContext, signal: AbortSignal): Promise<void>;
	monitor(ctx: EngineContext): Promise<void>;
	maxPositions(): number;
	describe(): StrategyParameters;
}

export function createWickSpikeStrategy(
	settings: ScanSettings = defaultScanSettings,
): Strategy {
	const { opener, gate } = settings;
	const threshold = config.threshold;
	return {
		name: "wick_spike",
		async prepare(ctx) {
			const markets = await fetchWithRetry(() => ctx.gateway.listMarkets(), settings.fetcher);
			const reference = settings.universe.referenceSymbol;
			if (!markets.has(reference)) throw new SymbolNotFoundError(reference);
		},
		async scan(ctx, signal) {
			await runScan(ctx, signal, settings);
		},
		monitor: monitorScalpPositions,
		maxPositions: () => opener.maxConcurrentPositions,
		describe() {
			const tier = opener.aggressionTiers[opener.aggressionTiers.length - 1];
			return {
				timeframe: gate.timeframe,
				leverage: opener.leverage,
				sizeUsdt: opener.positionSizeUsdt,
				slPct: opener.slPct,
				baseTpPct: tier.tpPct,
				riskReward: Number((tier.tpPct / opener.slPct).toFixed(2)),
				scoreRange: `${threshold.min}-${threshold.max}`,
				longOffset: threshold.longOffset,
				maxOpensPerScan: opener.maxOpensPerScan,
				cooldownMin: opener.cooldownMs / 60_000,
			};
		},
	};
}

export function createStrategy(name: StrategyName = config.engine.strategy): Strategy {
	return name === "dca" ? createDcaStrategy() : createWickSpikeStrategy();
}
