export function formatPrice(price: number | null | undefined): string {
	if (price === null || price === undefined || !Number.isFinite(price)) {
		return "N/A";
	}
	if (price < 0.01) return price.toFixed(6);
	if (price < 1) return price.toFixed(5);
	return price.toFixed(4);
}

export function formatSigned(value: number, digits = 2): string {
	const fixed = value.toFixed(digits);
	return value >= 0 ? `+${fixed}` : fixed;
}

export function round2(value: number): number {
	return Math.round(value * 100) / 100;
}
