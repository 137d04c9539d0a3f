import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

function envNumber(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw);
	return Number.isFinite(value) ? value : fallback;
}

function envList(name: string, fallback: string[]): string[] {
	const raw = process.env[name];
	if (!raw) return fallback;
	return raw
		.split(",")
		.map((item) => item.trim().toUpperCase())
		.filter(Boolean);
}

function envStrategy(): "wick_spike" | "dca" {
	return (process.env.ENGINE_STRATEGY || "wick_spike").toLowerCase() === "dca"
		? "dca"
		: "wick_spike";
}

const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "false").toLowerCase() === "true";
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");

export const config = {
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
		testnet: useTestnet,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
		pollTimeoutSec: envNumber("TELEGRAM_POLL_TIMEOUT_SEC", 25),
	},
	engine: {
		strategy: envStrategy(),
		monitorTickMs: envNumber("MONITOR_TICK_MS", 5_000),
		loopErrorCooldownMs: envNumber("LOOP_ERROR_COOLDOWN_MS", 5_000),
		housekeepingCron: process.env.HOUSEKEEPING_CRON || "* * * * *",
		timezone: "UTC",
	},
	fetcher: {
		concurrency: envNumber("FETCH_CONCURRENCY", 10),
		timeoutMs: envNumber("FETCH_TIMEOUT_MS", 8_000),
		retries: envNumber("FETCH_RETRIES", 2),
		backoffMs: envNumber("FETCH_BACKOFF_MS", 250),
		fallbackLimit: envNumber("FETCH_FALLBACK_LIMIT", 40),
	},
	universe: {
		quoteAsset: process.env.QUOTE_ASSET || "USDT",
		minQuoteVolume: envNumber("MIN_QUOTE_VOLUME_USD", 300_000),
		minPrice: envNumber("MIN_PRICE", 0.001),
		excludedBases: envList("EXCLUDED_BASES", [
			"USDC",
			"FDUSD",
			"TUSD",
			"USDP",
			"DAI",
			"BUSD",
			"EUR",
			"EURC",
			"USDE",
			"PYUSD",
		]),
		chunkSize: envNumber("SCAN_CHUNK_SIZE", 40),
		referenceSymbol: process.env.REFERENCE_SYMBOL || "BTCUSDT",
	},
	gate: {
		timeframe: "1m" as const,
		barLimit: envNumber("GATE_BAR_LIMIT", 69),
		atrPeriod: envNumber("ATR_PERIOD", 14),
		volumeWindow: envNumber("VOL_WINDOW", 50),
		minVolumeWindow: 20,
		maPeriod: 20,
		minBodyAtr: envNumber("MIN_BODY_ATR", 0.05),
		wickRatioShort: envNumber("WICK_RATIO_SHORT", 2.0),
		wickRatioLong: envNumber("WICK_RATIO_LONG", 2.5),
		spikeMin: envNumber("ATR_SPIKE_MULT", 1.8),
		spikeMaxShort: envNumber("SPIKE_MAX_SHORT", 6.0),
		spikeMaxLong: envNumber("SPIKE_MAX_LONG", 4.5),
		volumeZ: envNumber("VOL_Z_THRESHOLD", 2.0),
		minPrice: envNumber("MIN_PRICE", 0.001),
		maxPositionsPerSymbol: 1,
		staleBars: 2,
	},
	scorer: {
		timeframe: "15m" as const,
		barLimit: 60,
		maPeriod: 50,
		slopeLookback: 3,
		atrPeriod: 14,
		strongCounterTrend: 1.0,
		referenceLookback: 5,
		referenceVetoPct: envNumber("REFERENCE_VETO_PCT", 1.0),
		wickWeight: 0.5,
		wickExcessCap: 2.5,
		spikeWeight: 0.45,
		spikeExcessCap: 3.0,
		alignmentBonus: 0.1,
		counterTrendPenalty: 0.3,
		referencePenalty: 0.25,
		maDistancePenalty: 0.1,
		maDistanceFree: 3.0,
		missingHtfPenalty: 0.15,
		fullPassBonus: 0.1,
		longBias: 0.1,
	},
	threshold: {
		base: envNumber("SCORE_THRESHOLD_BASE", 1.8),
		min: 1.4,
		max: 2.4,
		pad: 0.02,
		smoothing: 0.4,
		maxJump: 0.15,
		minSample: 20,
		quantileTiers: [
			{ belowSize: 40, quantile: 0.85 },
			{ belowSize: 120, quantile: 0.95 },
		],
		largeSampleQuantile: 0.97,
		exploreStep: 0.05,
		exploreMaxVetoes: 3,
		openCapBump: 0.05,
		longOffset: 0.1,
	},
	opener: {
		maxConcurrentPositions: envNumber("MAX_CONCURRENT_POSITIONS", 10),
		maxOpensPerScan: envNumber("MAX_OPENS_PER_SCAN", 3),
		aggressionTiers: [
			{ minMargin: 0.3, tailFraction: 0.35, tpPct: 0.5 },
			{ minMargin: 0.15, tailFraction: 0.3, tpPct: 0.45 },
			{ minMargin: 0, tailFraction: 0.25, tpPct: 0.4 },
		],
		slPct: envNumber("SL_PCT", 0.2),
		slAtrMult: 0.5,
		touchTicks: 3,
		touchWickFrac: 0.15,
		touchAtrFrac: 0.1,
		lowPriceCutoff: 0.01,
		lowPriceFloorPct: 0.2,
		floorPct: 0.05,
		lowVolatilityAtrPct: 0.1,
		lowVolatilityFloorPct: 0.08,
		touchPollMs: envNumber("TOUCH_POLL_MS", 5_000),
		cooldownMs: envNumber("COOLDOWN_MINUTES", 15) * 60 * 1000,
		leverage: envNumber("LEVERAGE", 20),
		positionSizeUsdt: envNumber("POSITION_SIZE_USDT", 10),
	},
	scheduling: {
		scanIntervalMs: envNumber("SCAN_INTERVAL_SEC", 30) * 1000,
		scanBudgetMs: envNumber("SCAN_BUDGET_SEC", 25) * 1000,
	},
	dca: {
		symbol: process.env.DCA_SYMBOL || "ETHUSDT",
		entryTimeframe: "5m" as const,
		rangeTimeframe: "1h" as const,
		entryBarLimit: 90,
		tacticalLookback: 72,
		strategicLookback: 720,
		quantileLower: 0.025,
		quantileUpper: 0.975,
		rangeMinAtrMult: 1.5,
		entryBandPct: 0.15,
		scoreThreshold: envNumber("DCA_SCORE_THR", 0.55),
		weights: {
			border: 0.45,
			rsi: 0.15,
			emaDeviation: 0.2,
			supertrend: 0.1,
			volume: 0.1,
		},
		rsiPeriod: 14,
		volumeWindow: 50,
		bank: envNumber("DCA_BANK_USDT", 1500),
		cumDepositFracAtFull: 2 / 3,
		levels: envNumber("DCA_LEVELS", 7),
		growthThin: 2.0,
		growthWide: 1.6,
		thinRangePct: 3,
		leverage: envNumber("DCA_LEVERAGE", 10),
		maintenanceMarginRatio: 0.005,
		ladderPcts: [0.15, 0.3, 0.45, 0.6, 0.8, 1.0],
		ladderDedupePct: 0.1,
		tpPct: envNumber("DCA_TP_PCT", 1.0),
		trailStages: [
			{ armAt: 0.5, lock: 0.2 },
			{ armAt: 0.7, lock: 0.4 },
			{ armAt: 0.85, lock: 0.6 },
		],
		chandelierMult: 3.0,
		trailMinTicks: 2,
		retestBandPct: 0.3,
		rangeRebuildMs: 15 * 60 * 1000,
		feeTaker: 0.0005,
		cooldownMs: envNumber("DCA_COOLDOWN_MINUTES", 30) * 60 * 1000,
	},
	paths: {
		engineState: path.join(process.cwd(), "data/engine-state.json"),
		tradeLog: path.join(process.cwd(), "data/trade-log.json"),
		eventLog: path.join(process.cwd(), "data/trade-events.log"),
	},
};

export type Config = typeof config;
export type FetcherConfig = Config["fetcher"];
export type UniverseConfig = Config["universe"];
export type GateConfig = Config["gate"];
export type ScorerConfig = Config["scorer"];
export type ThresholdConfig = Config["threshold"];
export type OpenerConfig = Config["opener"];
export type SchedulingConfig = Config["scheduling"];
export type DcaConfig = Config["dca"];
