export class CooldownRegistry {
	private readonly expiries = new Map<string, number>();

	constructor(initial: Record<string, number> = {}) {
		for (const [symbol, until] of Object.entries(initial)) {
			if (Number.isFinite(until)) this.expiries.set(symbol, until);
		}
	}

	set(symbol: string, until: number): void {
		const current = this.expiries.get(symbol) ?? 0;
		this.expiries.set(symbol, Math.max(current, until));
	}

	isActive(symbol: string, now: number): boolean {
		const until = this.expiries.get(symbol);
		return until !== undefined && now < until;
	}

	remainingMs(symbol: string, now: number): number {
		const until = this.expiries.get(symbol);
		return until === undefined ? 0 : Math.max(0, until - now);
	}

	/** Drops expired entries; returns how many were removed. */
	purge(now: number): number {
		let removed = 0;
		for (const [symbol, until] of this.expiries) {
			if (now >= until) {
				this.expiries.delete(symbol);
				removed += 1;
			}
		}
		return removed;
	}

	get size(): number {
		return this.expiries.size;
	}

	toJSON(): Record<string, number> {
		return Object.fromEntries(this.expiries);
	}
}
