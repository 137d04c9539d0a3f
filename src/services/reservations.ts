import { logger } from "../utils/logger";

export type Reservation = {
	readonly symbol: string;
	readonly released: boolean;
	release(): boolean;
};

/**
 * Symbols between score acceptance and a confirmed open. The only writer is
 * the opener; a symbol can hold at most one reservation at a time.
 */
export class ReservationSet {
	private readonly held = new Set<string>();

	tryReserve(symbol: string): Reservation | null {
		if (this.held.has(symbol)) return null;
		this.held.add(symbol);

		let released = false;
		const held = this.held;
		return {
			symbol,
			get released() {
				return released;
			},
			release(): boolean {
				if (released) {
					logger.warn({ symbol }, "Reservation already released");
					return false;
				}
				released = true;
				held.delete(symbol);
				return true;
			},
		};
	}

	has(symbol: string): boolean {
		return this.held.has(symbol);
	}

	get size(): number {
		return this.held.size;
	}

	symbols(): string[] {
		return [...this.held];
	}
}
