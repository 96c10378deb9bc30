import {
	Bar,
	BreakoutParams,
	CrossoverParams,
	MalformedBarError,
	StrategyConfig,
	StrategyId,
} from "@fxdesk/core";

import { atrSeries } from "./atr";
import { BOLLINGER_PERIOD, bollingerSeries } from "./bollinger";
import { macdSeries } from "./macd";
import { MOMENTUM_LAG, momentumSeries } from "./momentum";
import { lastValue, rollingMax, rollingMean, rollingMin, shiftSeries } from "./rolling";
import { rsiSeries } from "./rsi";
import { emaSeries } from "./ema";

/** Extra bars on top of the longest lookback before a snapshot is trusted. */
export const SAFETY_MARGIN_BARS = 10;

export interface BreakoutSnapshot {
	kind: "breakout";
	timestamp: number;
	close: number;
	entryHigh: number;
	entryLow: number;
	exitHigh: number;
	exitLow: number;
	atr: number;
	volFilterPassed: boolean;
	trendUp: boolean;
	trendDown: boolean;
}

export interface CrossoverSnapshot {
	kind: "crossover";
	timestamp: number;
	close: number;
	fastEma: number;
	slowEma: number;
	macd: number;
	signalLine: number;
	macdHist: number;
	prevMacdHist: number;
	rsi: number;
	momentum: number;
	atr: number;
	bollingerMid: number;
	bollingerUpper: number;
	bollingerLower: number;
}

export interface InsufficientSnapshot {
	kind: "insufficient";
	reason: "insufficient_data";
	/** Latest bar time, 0 when no bar was supplied. */
	timestamp: number;
	available: number;
	required: number;
}

export type IndicatorSnapshot =
	| BreakoutSnapshot
	| CrossoverSnapshot
	| InsufficientSnapshot;

export interface IndicatorPipeline<
	TSnapshot extends BreakoutSnapshot | CrossoverSnapshot =
		| BreakoutSnapshot
		| CrossoverSnapshot,
> {
	readonly id: StrategyId;
	readonly requiredBars: number;
	compute(bars: readonly Bar[]): TSnapshot | InsufficientSnapshot;
}

const REQUIRED_FIELDS = ["timestamp", "high", "low", "close"] as const;

export const validateBars = (bars: readonly Bar[]): void => {
	bars.forEach((bar, index) => {
		for (const field of REQUIRED_FIELDS) {
			const value: unknown = bar[field];
			if (typeof value !== "number" || !Number.isFinite(value)) {
				throw new MalformedBarError(index, field, value);
			}
		}
	});
};

export const breakoutRequiredBars = (params: BreakoutParams): number =>
	Math.max(
		params.entryPeriod + 1,
		params.exitPeriod + 1,
		params.useVolFilter
			? params.atrPeriod + params.volLookback - 1
			: params.atrPeriod,
		params.useTrendFilter ? params.trendPeriod : 0
	) + SAFETY_MARGIN_BARS;

export const crossoverRequiredBars = (params: CrossoverParams): number =>
	Math.max(
		params.slowEma,
		params.rsiPeriod + 1,
		BOLLINGER_PERIOD,
		MOMENTUM_LAG + 1,
		params.atrPeriod
	) + SAFETY_MARGIN_BARS;

const insufficient = (
	bars: readonly Bar[],
	required: number
): InsufficientSnapshot => ({
	kind: "insufficient",
	reason: "insufficient_data",
	timestamp: bars.length ? bars[bars.length - 1].timestamp : 0,
	available: bars.length,
	required,
});

export const computeBreakoutSnapshot = (
	bars: readonly Bar[],
	params: BreakoutParams
): BreakoutSnapshot | InsufficientSnapshot => {
	validateBars(bars);
	const required = breakoutRequiredBars(params);
	if (bars.length < required) {
		return insufficient(bars, required);
	}

	const highs = bars.map((bar) => bar.high);
	const lows = bars.map((bar) => bar.low);
	const closes = bars.map((bar) => bar.close);

	// Channels only look at bars before the current one.
	const entryHigh = lastValue(shiftSeries(rollingMax(highs, params.entryPeriod)));
	const entryLow = lastValue(shiftSeries(rollingMin(lows, params.entryPeriod)));
	const exitHigh = lastValue(shiftSeries(rollingMax(highs, params.exitPeriod)));
	const exitLow = lastValue(shiftSeries(rollingMin(lows, params.exitPeriod)));

	const atrValues = atrSeries(bars, params.atrPeriod);
	const atr = lastValue(atrValues);
	const avgAtr = params.useVolFilter
		? lastValue(rollingMean(atrValues, params.volLookback))
		: null;
	const trendSma = params.useTrendFilter
		? lastValue(rollingMean(closes, params.trendPeriod))
		: null;

	if (
		entryHigh === null ||
		entryLow === null ||
		exitHigh === null ||
		exitLow === null ||
		atr === null ||
		(params.useVolFilter && avgAtr === null) ||
		(params.useTrendFilter && trendSma === null)
	) {
		return insufficient(bars, required);
	}

	const latest = bars[bars.length - 1];
	return {
		kind: "breakout",
		timestamp: latest.timestamp,
		close: latest.close,
		entryHigh,
		entryLow,
		exitHigh,
		exitLow,
		atr,
		volFilterPassed:
			avgAtr === null ? true : atr > avgAtr * params.volThreshold,
		trendUp: trendSma === null ? true : latest.close > trendSma,
		trendDown: trendSma === null ? true : latest.close < trendSma,
	};
};

export const computeCrossoverSnapshot = (
	bars: readonly Bar[],
	params: CrossoverParams
): CrossoverSnapshot | InsufficientSnapshot => {
	validateBars(bars);
	const required = crossoverRequiredBars(params);
	if (bars.length < required) {
		return insufficient(bars, required);
	}

	const closes = bars.map((bar) => bar.close);
	const last = closes.length - 1;

	const fastEma = emaSeries(closes, params.fastEma)[last];
	const slowEma = emaSeries(closes, params.slowEma)[last];
	const macdValues = macdSeries(
		closes,
		params.fastEma,
		params.slowEma,
		params.signalEma
	);
	const rsi = lastValue(rsiSeries(closes, params.rsiPeriod));
	const momentum = lastValue(momentumSeries(closes));
	const atr = lastValue(atrSeries(bars, params.atrPeriod));
	const bands = bollingerSeries(closes);
	const bollingerMid = lastValue(bands.mid);
	const bollingerUpper = lastValue(bands.upper);
	const bollingerLower = lastValue(bands.lower);

	if (
		rsi === null ||
		momentum === null ||
		atr === null ||
		bollingerMid === null ||
		bollingerUpper === null ||
		bollingerLower === null
	) {
		return insufficient(bars, required);
	}

	return {
		kind: "crossover",
		timestamp: bars[last].timestamp,
		close: closes[last],
		fastEma,
		slowEma,
		macd: macdValues.macd[last],
		signalLine: macdValues.signal[last],
		macdHist: macdValues.histogram[last],
		prevMacdHist: macdValues.histogram[last - 1],
		rsi,
		momentum,
		atr,
		bollingerMid,
		bollingerUpper,
		bollingerLower,
	};
};

export function createIndicatorPipeline(
	config: StrategyConfig
): IndicatorPipeline {
	switch (config.id) {
		case "breakout":
			return {
				id: config.id,
				requiredBars: breakoutRequiredBars(config),
				compute: (bars) => computeBreakoutSnapshot(bars, config),
			};
		case "crossover":
			return {
				id: config.id,
				requiredBars: crossoverRequiredBars(config),
				compute: (bars) => computeCrossoverSnapshot(bars, config),
			};
	}
}
