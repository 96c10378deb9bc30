/**
 * Series keep the input length; `null` marks positions where the window is
 * not yet full or an input inside the window is undefined.
 */
export type Series = Array<number | null>;

const rolling = (
	values: readonly (number | null)[],
	period: number,
	reduce: (window: number[]) => number
): Series => {
	const series: Series = new Array(values.length).fill(null);
	if (period <= 0) {
		return series;
	}

	for (let i = period - 1; i < values.length; i += 1) {
		const window: number[] = [];
		for (let j = i - period + 1; j <= i; j += 1) {
			const value = values[j];
			if (value === null) {
				break;
			}
			window.push(value);
		}
		if (window.length === period) {
			series[i] = reduce(window);
		}
	}

	return series;
};

const sum = (nums: number[]): number =>
	nums.reduce((acc, value) => acc + value, 0);

export const rollingMax = (
	values: readonly (number | null)[],
	period: number
): Series => rolling(values, period, (window) => Math.max(...window));

export const rollingMin = (
	values: readonly (number | null)[],
	period: number
): Series => rolling(values, period, (window) => Math.min(...window));

export const rollingMean = (
	values: readonly (number | null)[],
	period: number
): Series => rolling(values, period, (window) => sum(window) / period);

/** Sample standard deviation (n - 1). Undefined for windows shorter than 2. */
export const rollingStd = (
	values: readonly (number | null)[],
	period: number
): Series => {
	if (period < 2) {
		return new Array(values.length).fill(null);
	}
	return rolling(values, period, (window) => {
		const mean = sum(window) / period;
		const squares = window.reduce(
			(acc, value) => acc + (value - mean) * (value - mean),
			0
		);
		return Math.sqrt(squares / (period - 1));
	});
};

/** Moves every value `offset` positions later, leaving `null` at the front. */
export const shiftSeries = (
	values: readonly (number | null)[],
	offset = 1
): Series =>
	values.map((_, index) =>
		index - offset >= 0 && index - offset < values.length
			? values[index - offset]
			: null
	);

export const lastValue = (series: readonly (number | null)[]): number | null =>
	series.length ? series[series.length - 1] : null;
