import { Series } from "./rolling";

export const MOMENTUM_LAG = 12;

/** close / close[lag bars ago] - 1 */
export function momentumSeries(
	closes: readonly number[],
	lag = MOMENTUM_LAG
): Series {
	return closes.map((close, index) => {
		if (index < lag) {
			return null;
		}
		const base = closes[index - lag];
		return base === 0 ? null : close / base - 1;
	});
}
