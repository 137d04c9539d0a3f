import { config } from "../config";
import type { ExitReason, Position, Side } from "../types";
import { errorMessage } from "../utils/errors";
import { formatPrice, formatSigned } from "../utils/format";
import { logger } from "../utils/logger";
import type { EngineContext } from "./engineContext";
import { notify } from "./notifier";

export function activePositions(ctx: EngineContext): Position[] {
	return ctx.positions.filter((p) => p.status === "ACTIVE");
}

export function findActive(ctx: EngineContext, symbol: string): Position | undefined {
	return ctx.positions.find((p) => p.symbol === symbol && p.status === "ACTIVE");
}

/** Open positions plus any in-flight reservation on the symbol. */
export function exposure(ctx: EngineContext, symbol: string): number {
	const open = ctx.positions.filter(
		(p) => p.symbol === symbol && p.status === "ACTIVE",
	).length;
	return open + (ctx.reservations.has(symbol) ? 1 : 0);
}

export function addPosition(ctx: EngineContext, position: Position): void {
	ctx.positions = [...ctx.positions, position];
}

/** Swaps in the updated copy; ignored once the position has left the book. */
export function replacePosition(ctx: EngineContext, position: Position): boolean {
	const index = ctx.positions.findIndex((p) => p.id === position.id);
	if (index < 0 || ctx.positions[index].status !== "ACTIVE") return false;
	const next = [...ctx.positions];
	next[index] = position;
	ctx.positions = next;
	return true;
}

export function directionOf(side: Side): 1 | -1 {
	return side === "LONG" ? 1 : -1;
}

/** Signed unleveraged return from `entry` to `exit`. */
export function priceReturn(side: Side, entry: number, exit: number): number {
	return ((exit - entry) / entry) * directionOf(side);
}

export function referencePrice(position: Position): number {
	return position.kind === "scalp" ? position.entryPrice : position.averagePrice;
}

export function committedMargin(position: Position): number {
	if (position.kind === "scalp") return position.sizeUsdt;
	return position.steps.reduce((acc, step) => acc + step.margin, 0);
}

export function realizedPnl(
	position: Position,
	exitPrice: number,
): { pnlPct: number; pnlUsd: number } {
	const ret = priceReturn(position.side, referencePrice(position), exitPrice);
	return {
		pnlPct: ret * 100 * position.leverage,
		pnlUsd: committedMargin(position) * ret * position.leverage,
	};
}

export function excursionPct(position: Position): {
	maxFavorablePct: number;
	maxAdversePct: number;
} {
	const ref = referencePrice(position);
	return {
		maxFavorablePct: priceReturn(position.side, ref, position.maxFavorablePrice) * 100,
		maxAdversePct: priceReturn(position.side, ref, position.maxAdversePrice) * 100,
	};
}

export function trackExcursion<T extends Position>(
	position: T,
	high: number,
	low: number,
): T {
	const isLong = position.side === "LONG";
	return {
		...position,
		maxFavorablePrice: isLong
			? Math.max(position.maxFavorablePrice, high)
			: Math.min(position.maxFavorablePrice, low),
		maxAdversePrice: isLong
			? Math.min(position.maxAdversePrice, low)
			: Math.max(position.maxAdversePrice, high),
	};
}

function cooldownFor(position: Position): number {
	return position.kind === "scalp" ? config.opener.cooldownMs : config.dca.cooldownMs;
}

function closeMessage(
	position: Position,
	exitPrice: number,
	reason: ExitReason,
	pnlUsd: number,
	pnlPct: number,
	holdingMinutes: number,
): string {
	const { maxFavorablePct, maxAdversePct } = excursionPct(position);
	const icon = pnlUsd >= 0 ? "✅" : "❌";
	return [
		`${icon} ${reason} ${position.symbol} ${position.side}`,
		`Exit: ${formatPrice(exitPrice)}`,
		`P&L: ${formatSigned(pnlUsd)} USDT (${formatSigned(pnlPct)}%)`,
		`MFE ${formatSigned(maxFavorablePct)}% | MAE ${formatSigned(maxAdversePct)}%`,
		`Held ${holdingMinutes.toFixed(1)} min`,
	].join("\n");
}

/**
 * Removes the position from the book and settles it. Returns null when the
 * position is unknown or already closed.
 */
export async function closePosition(
	ctx: EngineContext,
	positionId: string,
	exitPrice: number,
	reason: ExitReason,
): Promise<Position | null> {
	const position = ctx.positions.find((p) => p.id === positionId);
	if (!position || position.status !== "ACTIVE") return null;

	const now = ctx.clock.now();
	const { pnlPct, pnlUsd } = realizedPnl(position, exitPrice);
	const holdingMinutes = (now - position.openedAt) / 60_000;
	const closed: Position = {
		...position,
		status: "CLOSED",
		closedAt: now,
		exitPrice,
		exitReason: reason,
		pnlUsd,
	};

	ctx.positions = ctx.positions.filter((p) => p.id !== positionId);
	ctx.cooldowns.set(position.symbol, now + cooldownFor(position));
	ctx.stats.closes += 1;

	logger.info(
		{ symbol: position.symbol, side: position.side, reason, exitPrice, pnlUsd, pnlPct },
		"Position closed",
	);

	await ctx.persist();
	await notify(
		ctx.notifier,
		closeMessage(closed, exitPrice, reason, pnlUsd, pnlPct, holdingMinutes),
	);

	const { maxFavorablePct, maxAdversePct } = excursionPct(closed);
	try {
		await ctx.tradeLog.recordClose(position.id, {
			exitPrice,
			exitReason: reason,
			pnlUsd,
			pnlPct,
			maxFavorablePct,
			maxAdversePct,
			holdingMinutes,
			closedAt: now,
		});
		await ctx.tradeLog.recordEvent({
			eventId: `CLOSE_${position.id}`,
			signalId: position.id,
			type: "CLOSE",
			symbol: position.symbol,
			side: position.side,
			at: now,
			data: { reason, exitPrice, pnlUsd, pnlPct, holdingMinutes },
		});
	} catch (error) {
		logger.warn(
			{ symbol: position.symbol, error: errorMessage(error) },
			"Failed to record trade close",
		);
	}

	return closed;
}
