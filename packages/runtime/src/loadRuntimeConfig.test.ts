import path from "node:path";
import { ConfigurationError } from "@fxdesk/core";
import { describe, expect, it } from "vitest";

import { loadRuntimeConfig } from "./loadRuntimeConfig";

const fixtures = path.join(__dirname, "__tests__", "fixtures");
const baseOptions = {
	configDir: fixtures,
	envPath: path.join(fixtures, "runtime.env"),
};

describe("loadRuntimeConfig", () => {
	it("prefers the command line strategy over the environment", () => {
		const { config, selection } = loadRuntimeConfig({
			...baseOptions,
			requestedStrategyId: " Breakout ",
		});

		expect(selection).toEqual({
			resolvedStrategyId: "breakout",
			source: "cli",
			invalidSources: [],
		});
		expect(config.strategy.id).toBe("breakout");
		expect(config.strategy.symbols).toEqual(["EURUSD", "GBPUSD"]);
		expect(config.risk.maxDailyLoss).toBe(0.03);
	});

	it("falls back to TRADER_STRATEGY and reports unknown ids", () => {
		const { config, selection } = loadRuntimeConfig({
			...baseOptions,
			requestedStrategyId: "scalper",
		});

		expect(selection).toEqual({
			resolvedStrategyId: "crossover",
			source: "env",
			invalidSources: [{ source: "cli", value: "scalper" }],
		});
		expect(config.strategy.id).toBe("crossover");
		expect(config.strategy.session).toEqual({
			enabled: true,
			start: 7,
			end: 17,
			closeLeadHours: 1,
		});
	});

	it("fails on a missing risk profile", () => {
		expect(() =>
			loadRuntimeConfig({ ...baseOptions, riskProfile: "aggressive" })
		).toThrow(ConfigurationError);
	});
});
