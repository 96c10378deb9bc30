import {
	Bar,
	DEFAULT_BREAKOUT_PARAMS,
	DEFAULT_CROSSOVER_PARAMS,
	DEFAULT_SESSION,
	MalformedBarError,
	StrategyConfig,
} from "@fxdesk/core";
import { describe, expect, it } from "vitest";
import {
	breakoutRequiredBars,
	computeBreakoutSnapshot,
	computeCrossoverSnapshot,
	createIndicatorPipeline,
} from "./pipeline";

const HOUR_MS = 3_600_000;
const START = Date.UTC(2024, 0, 1);

const makeBar = (index: number, high: number, spread = 0.02): Bar => ({
	timestamp: START + index * HOUR_MS,
	open: high,
	high,
	low: high - spread,
	close: high,
	volume: 1,
});

const breakoutBars = (count: number): Bar[] =>
	Array.from({ length: count }, (_, index) =>
		makeBar(index, index < 70 ? 1.1 : index < 90 ? 1.2 : 1.6)
	);

const breakoutParams = {
	...DEFAULT_BREAKOUT_PARAMS,
	volLookback: 20,
	trendPeriod: 50,
};

const flatThenRise = (count: number): Bar[] =>
	Array.from({ length: count }, (_, index) =>
		makeBar(index, index < 40 ? 1 : 1 + (index - 39) * 0.01)
	);

describe("computeBreakoutSnapshot", () => {
	it("needs the longest lookback plus the safety margin", () => {
		expect(breakoutRequiredBars(breakoutParams)).toBe(60);
		expect(computeBreakoutSnapshot(breakoutBars(59), breakoutParams)).toEqual({
			kind: "insufficient",
			reason: "insufficient_data",
			timestamp: START + 58 * HOUR_MS,
			available: 59,
			required: 60,
		});
	});

	it("builds channels from the bars before the latest one", () => {
		const snapshot = computeBreakoutSnapshot(breakoutBars(71), breakoutParams);
		expect(snapshot.kind).toBe("breakout");
		if (snapshot.kind !== "breakout") return;
		expect(snapshot.close).toBe(1.2);
		expect(snapshot.entryHigh).toBe(1.1);
		expect(snapshot.exitLow).toBe(1.1 - 0.02);
		expect(snapshot.atr).toBeCloseTo((13 * 0.02 + 0.1) / 14, 8);
		expect(snapshot.volFilterPassed).toBe(true);
		expect(snapshot.trendUp).toBe(true);
		expect(snapshot.trendDown).toBe(false);
	});

	it("fails the volatility filter on a quiet market", () => {
		const snapshot = computeBreakoutSnapshot(breakoutBars(70), breakoutParams);
		expect(snapshot.kind === "breakout" && snapshot.volFilterPassed).toBe(false);
	});

	it("passes both filters when they are switched off", () => {
		const params = {
			...breakoutParams,
			useVolFilter: false,
			useTrendFilter: false,
		};
		expect(breakoutRequiredBars(params)).toBe(31);
		const snapshot = computeBreakoutSnapshot(breakoutBars(40), params);
		expect(snapshot).toMatchObject({
			kind: "breakout",
			volFilterPassed: true,
			trendUp: true,
			trendDown: true,
		});
	});

	it("throws on a bar holding a non-finite value", () => {
		const bars = breakoutBars(80);
		bars[3] = { ...bars[3], close: Number.NaN };
		expect(() => computeBreakoutSnapshot(bars, breakoutParams)).toThrowError(
			new MalformedBarError(3, "close", Number.NaN).message
		);
	});
});

describe("computeCrossoverSnapshot", () => {
	it("reports insufficient data below the warm-up", () => {
		const snapshot = computeCrossoverSnapshot(
			flatThenRise(30),
			DEFAULT_CROSSOVER_PARAMS
		);
		expect(snapshot).toMatchObject({
			kind: "insufficient",
			available: 30,
			required: 31,
		});
	});

	it("captures a fresh histogram turn on the first rising bar", () => {
		const snapshot = computeCrossoverSnapshot(
			flatThenRise(41),
			DEFAULT_CROSSOVER_PARAMS
		);
		expect(snapshot.kind).toBe("crossover");
		if (snapshot.kind !== "crossover") return;
		expect(snapshot.fastEma).toBeCloseTo(1.002, 12);
		expect(snapshot.slowEma).toBeCloseTo(1 + 0.01 / 11, 12);
		expect(snapshot.prevMacdHist).toBe(0);
		expect(snapshot.macdHist).toBeGreaterThan(0);
		expect(snapshot.rsi).toBe(100);
		expect(snapshot.momentum).toBeCloseTo(0.01, 12);
		expect(snapshot.bollingerMid).toBeCloseTo(1.0005, 12);
	});
});

describe("createIndicatorPipeline", () => {
	it("selects the computation by strategy id", () => {
		const config: StrategyConfig = {
			id: "crossover",
			symbols: ["EURUSD"],
			timeframe: "1h",
			historyBars: 120,
			session: DEFAULT_SESSION,
			...DEFAULT_CROSSOVER_PARAMS,
		};
		const pipeline = createIndicatorPipeline(config);
		expect(pipeline.id).toBe("crossover");
		expect(pipeline.requiredBars).toBe(31);
		expect(pipeline.compute(flatThenRise(41)).kind).toBe("crossover");
	});
});
