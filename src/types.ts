export type Timeframe = "1m" | "5m" | "15m" | "1h" | "4h" | "1d";

export type Bar = {
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type Ticker = {
	last: number;
	bid: number;
	ask: number;
};

export type TickerStats = {
	symbol: string;
	last: number;
	quoteVolume: number;
	priceChangePct: number;
};

export type SymbolMeta = {
	symbol: string;
	baseAsset: string;
	quoteAsset: string;
	tickSize: number;
};

export type UniverseEntry = {
	symbol: string;
	baseAsset: string;
	quoteVolume: number;
	last: number;
};

export type Side = "LONG" | "SHORT";

export type GateMetrics = {
	atr: number;
	bodyAtr: number;
	wickRatio: number;
	wickLength: number;
	spikeMultiple: number;
	volumeZ: number | null;
	maDistanceAtr: number;
};

export type GatePasses = {
	wick: boolean;
	range: boolean;
	volume: boolean;
};

export type GateRejectReason =
	| "cooldown"
	| "position_limit"
	| "insufficient_history"
	| "stale_bar"
	| "price_floor"
	| "micro_body"
	| "no_dominant_wick"
	| "non_finite"
	| "gate_failed";

export type GateResult = {
	symbol: string;
	side: Side;
	bar: Bar;
	metrics: GateMetrics;
	passes: GatePasses;
	passCount: number;
	passed: boolean;
};

export type GateOutcome =
	| { kind: "evaluated"; result: GateResult }
	| { kind: "rejected"; symbol: string; reason: GateRejectReason };

export type VetoReason = "strong_counter_trend" | "reference_against";

export type ScoreBreakdown = {
	wick: number;
	spike: number;
	trend: number;
	reference: number;
	maDistance: number;
	missingHtf: number;
	passBonus: number;
	sideBias: number;
};

export type ScoreOutcome =
	| { kind: "scored"; score: number; breakdown: ScoreBreakdown; trendSlope: number | null }
	| { kind: "vetoed"; reason: VetoReason };

export type CandidateSignal = {
	symbol: string;
	side: Side;
	score: number;
	barOpenTime: number;
	bar: Bar;
	metrics: GateMetrics;
	passCount: number;
};

export type ThresholdState = {
	value: number;
	updatedAt: number;
	lastDelta: number;
};

export type PositionStatus = "ACTIVE" | "CLOSED";

export type ExitReason =
	| "STOP_LOSS"
	| "TAKE_PROFIT"
	| "TRAILING_STOP"
	| "MANUAL";

type PositionBase = {
	id: string;
	symbol: string;
	side: Side;
	status: PositionStatus;
	openedAt: number;
	entryBarOpenTime: number;
	leverage: number;
	stopLoss: number | null;
	takeProfit: number;
	maxFavorablePrice: number;
	maxAdversePrice: number;
	closedAt?: number;
	exitPrice?: number;
	exitReason?: ExitReason;
	pnlUsd?: number;
};

export type ScalpPosition = PositionBase & {
	kind: "scalp";
	entryPrice: number;
	stopLoss: number;
	sizeUsdt: number;
	score: number;
	lastEvaluatedBarOpenTime: number;
};

export type DcaStep = {
	price: number;
	quantity: number;
	margin: number;
	filledAt: number;
	retest: boolean;
};

export type DcaPosition = PositionBase & {
	kind: "dca";
	growth: number;
	stepMargins: number[];
	steps: DcaStep[];
	quantity: number;
	averagePrice: number;
	ladder: number[];
	trailingStage: number;
	frozen: boolean;
	reservedFinalStep: boolean;
};

export type Position = ScalpPosition | DcaPosition;

export type TradeOpenRecord = {
	signalId: string;
	symbol: string;
	side: Side;
	strategy: string;
	entryPrice: number;
	stopLoss: number | null;
	takeProfit: number;
	leverage: number;
	score?: number;
	openedAt: number;
};

export type TradeCloseFields = {
	exitPrice: number;
	exitReason: ExitReason;
	pnlUsd: number;
	pnlPct: number;
	maxFavorablePct: number;
	maxAdversePct: number;
	holdingMinutes: number;
	closedAt: number;
};

export type TradeRecord = TradeOpenRecord &
	Partial<TradeCloseFields> & { status: PositionStatus };

export type EngineSnapshot = {
	enabled: boolean;
	threshold: ThresholdState;
	positions: Position[];
	cooldowns: Record<string, number>;
	rotationOffset: number;
	telegramUpdateOffset: number;
	subscribers: string[];
};
