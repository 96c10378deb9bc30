import { Series, rollingMean, rollingStd } from "./rolling";

export interface BollingerSeries {
	mid: Series;
	upper: Series;
	lower: Series;
}

export const BOLLINGER_PERIOD = 20;

export function bollingerSeries(
	closes: readonly number[],
	period = BOLLINGER_PERIOD,
	deviations = 2
): BollingerSeries {
	const mid = rollingMean(closes, period);
	const std = rollingStd(closes, period);
	const band = (sign: 1 | -1): Series =>
		mid.map((value, index) => {
			const deviation = std[index];
			return value === null || deviation === null
				? null
				: value + sign * deviations * deviation;
		});

	return { mid, upper: band(1), lower: band(-1) };
}
