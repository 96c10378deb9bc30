import {
	DEFAULT_BREAKOUT_PARAMS,
	DEFAULT_CROSSOVER_PARAMS,
	DEFAULT_SESSION,
	StrategyConfig,
} from "@fxdesk/core";
import { describe, expect, it } from "vitest";
import { BreakoutSignalEngine } from "./BreakoutSignalEngine";
import { CrossoverSignalEngine } from "./CrossoverSignalEngine";
import { SessionGatedSignalEngine } from "./SessionGatedSignalEngine";
import { createStrategy } from "./strategyEngine";

const breakout: StrategyConfig = {
	id: "breakout",
	symbols: ["EURUSD"],
	timeframe: "4h",
	historyBars: 300,
	session: DEFAULT_SESSION,
	...DEFAULT_BREAKOUT_PARAMS,
};

const crossover: StrategyConfig = {
	id: "crossover",
	symbols: ["EURUSD"],
	timeframe: "1h",
	historyBars: 120,
	session: { ...DEFAULT_SESSION, enabled: true },
	...DEFAULT_CROSSOVER_PARAMS,
};

describe("createStrategy", () => {
	it("pairs the breakout engine with the breakout pipeline", () => {
		const strategy = createStrategy(breakout);
		expect(strategy.engine).toBeInstanceOf(BreakoutSignalEngine);
		expect(strategy.pipeline.id).toBe("breakout");
		expect(strategy.pipeline.requiredBars).toBe(210);
	});

	it("wraps the engine in the session gate when the session is enabled", () => {
		const strategy = createStrategy(crossover);
		expect(strategy.engine).toBeInstanceOf(SessionGatedSignalEngine);
		expect(strategy.pipeline.id).toBe("crossover");
		expect(createStrategy({ ...crossover, session: DEFAULT_SESSION }).engine)
			.toBeInstanceOf(CrossoverSignalEngine);
	});
});
