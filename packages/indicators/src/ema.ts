/**
 * Recursive EMA seeded with the first observation, weight 2 / (period + 1).
 * Every position holds a value, including the first.
 */
export function emaSeries(values: readonly number[], period: number): number[] {
	if (period <= 0 || values.length === 0) {
		return [];
	}

	const multiplier = 2 / (period + 1);
	const series: number[] = [values[0]];
	let emaValue = values[0];

	for (let i = 1; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series.push(emaValue);
	}

	return series;
}

export function ema(values: readonly number[], period: number): number | null {
	const series = emaSeries(values, period);
	return series.length ? series[series.length - 1] : null;
}
