export function smaSeries(values: number[], period: number): number[] {
	const out: number[] = values.map(() => Number.NaN);
	let sum = 0;
	for (let i = 0; i < values.length; i++) {
		sum += values[i];
		if (i >= period) sum -= values[i - period];
		if (i >= period - 1) out[i] = sum / period;
	}
	return out;
}

export function emaSeries(values: number[], period: number): number[] {
	const out: number[] = values.map(() => Number.NaN);
	if (values.length < period) return out;

	const k = 2 / (period + 1);
	let ema = values.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	out[period - 1] = ema;
	for (let i = period; i < values.length; i++) {
		ema = values[i] * k + ema * (1 - k);
		out[i] = ema;
	}
	return out;
}

export function last(values: number[]): number {
	return values.length ? values[values.length - 1] : Number.NaN;
}
