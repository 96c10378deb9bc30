import { Series, rollingMean } from "./rolling";

export function rsiSeries(values: readonly number[], period = 14): Series {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	const gains: number[] = [];
	const losses: number[] = [];

	values.forEach((value, index) => {
		const change = index === 0 ? 0 : value - values[index - 1];
		gains.push(change > 0 ? change : 0);
		losses.push(change < 0 ? -change : 0);
	});

	const avgGains = rollingMean(gains, period);
	const avgLosses = rollingMean(losses, period);

	return avgGains.map((avgGain, index) => {
		const avgLoss = avgLosses[index];
		if (avgGain === null || avgLoss === null) {
			return null;
		}
		// A window without losses reads as fully overbought, flat windows included.
		if (avgLoss === 0) {
			return 100;
		}
		return 100 - 100 / (1 + avgGain / avgLoss);
	});
}
