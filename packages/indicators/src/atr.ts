import { Series, rollingMean } from "./rolling";

export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

export function trueRangeSeries(candles: readonly AtrInput[]): number[] {
	return candles.map((current, index) => {
		const highLow = current.high - current.low;
		if (index === 0) {
			return highLow;
		}
		const previousClose = candles[index - 1].close;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		return Math.max(highLow, highClose, lowClose);
	});
}

/** Simple rolling mean of the true range, not Wilder smoothing. */
export function atrSeries(candles: readonly AtrInput[], period = 14): Series {
	return rollingMean(trueRangeSeries(candles), period);
}
