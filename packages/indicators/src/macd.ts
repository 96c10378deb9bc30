import { emaSeries } from "./ema";

export interface MacdSeries {
	macd: number[];
	signal: number[];
	histogram: number[];
}

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

export function macdSeries(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdSeries {
	if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
		return { macd: [], signal: [], histogram: [] };
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	const macdLine = fastSeries.map((value, index) => value - slowSeries[index]);
	const signalLine = emaSeries(macdLine, signalLength);

	return {
		macd: macdLine,
		signal: signalLine,
		histogram: macdLine.map((value, index) => value - signalLine[index]),
	};
}

export function macd(
	closes: readonly number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	const series = macdSeries(closes, fast, slow, signalLength);
	const last = series.macd.length - 1;
	if (last < 0) {
		return { macd: null, signal: null, histogram: null };
	}
	return {
		macd: series.macd[last],
		signal: series.signal[last],
		histogram: series.histogram[last],
	};
}
