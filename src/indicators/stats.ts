export function mean(values: number[]): number {
	if (!values.length) return Number.NaN;
	return values.reduce((acc, val) => acc + val, 0) / values.length;
}

/** Sample standard deviation (n - 1). */
export function stdDev(values: number[]): number {
	if (values.length < 2) return Number.NaN;
	const mu = mean(values);
	const variance =
		values.reduce((acc, val) => acc + (val - mu) ** 2, 0) / (values.length - 1);
	return Math.sqrt(variance);
}

export function zScore(value: number, window: number[]): number {
	const sigma = stdDev(window);
	if (!Number.isFinite(sigma) || sigma === 0) return Number.NaN;
	return (value - mean(window)) / sigma;
}

/** Linear-interpolated quantile, q in [0, 1]. */
export function quantile(values: number[], q: number): number {
	if (!values.length) return Number.NaN;
	const sorted = [...values].sort((a, b) => a - b);
	const pos = Math.min(Math.max(q, 0), 1) * (sorted.length - 1);
	const lo = Math.floor(pos);
	const hi = Math.ceil(pos);
	return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}
