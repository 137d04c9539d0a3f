/** Wilder RSI of the last value. */
export function calculateRsi(closes: number[], period: number): number {
	if (closes.length < period + 1) return Number.NaN;

	let gain = 0;
	let loss = 0;
	for (let i = 1; i <= period; i++) {
		const change = closes[i] - closes[i - 1];
		if (change >= 0) gain += change;
		else loss -= change;
	}
	gain /= period;
	loss /= period;

	for (let i = period + 1; i < closes.length; i++) {
		const change = closes[i] - closes[i - 1];
		gain = (gain * (period - 1) + Math.max(change, 0)) / period;
		loss = (loss * (period - 1) + Math.max(-change, 0)) / period;
	}

	if (loss === 0) return gain === 0 ? 50 : 100;
	return 100 - 100 / (1 + gain / loss);
}
