import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
	DEFAULT_BREAKOUT_PARAMS,
	getConfigMetadata,
	loadEnvConfig,
	loadRiskConfig,
	loadStrategyConfig,
	parseStrategyConfig,
} from "./config";
import { ConfigurationError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

describe("loadStrategyConfig", () => {
	it("throws when the config file omits an id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "missing-id")).toThrowError(
			/must include an "id"/i
		);
	});

	it("throws when the config file references an unknown strategy id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "unknown-id")).toThrowError(
			/Unknown strategy id/i
		);
	});

	it("fills breakout defaults and normalizes symbols", () => {
		const config = loadStrategyConfig(FIXTURE_DIR, "breakout");
		expect(config.id).toBe("breakout");
		if (config.id !== "breakout") return;
		expect(config.symbols).toEqual(["EURUSD", "GBPUSD"]);
		expect(config.entryPeriod).toBe(55);
		expect(config.volThreshold).toBe(1.5);
		expect(config.exitPeriod).toBe(DEFAULT_BREAKOUT_PARAMS.exitPeriod);
		expect(config.session.enabled).toBe(false);
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "strategies", "breakout.json"),
			profile: "breakout",
		});
	});

	it("enables the session window when one is configured", () => {
		const config = loadStrategyConfig(FIXTURE_DIR, "crossover");
		expect(config.session).toEqual({
			enabled: true,
			start: 7,
			end: 17,
			closeLeadHours: 1,
		});
	});

	it("rejects a session that wraps midnight", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "bad-session")).toThrowError(
			ConfigurationError
		);
	});

	it("rejects a fast EMA that is not shorter than the slow EMA", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "bad-periods")).toThrowError(
			/fastEma \(21\) must be shorter than slowEma \(9\)/
		);
	});

	it("reports a missing profile file", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "absent")).toThrowError(
			/Config file not found/
		);
	});
});

describe("parseStrategyConfig", () => {
	it("rejects non-numeric tuning values with the offending field", () => {
		try {
			parseStrategyConfig({ id: "breakout", atrPeriod: "14" });
			expect.fail("expected a ConfigurationError");
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigurationError);
			if (error instanceof ConfigurationError) {
				expect(error.field).toBe("strategy.atrPeriod");
			}
		}
	});

	it("rejects an unknown timeframe unit", () => {
		expect(() =>
			parseStrategyConfig({ id: "crossover", timeframe: "4x" })
		).toThrowError(ConfigurationError);
	});
});

describe("loadRiskConfig", () => {
	it("reads limits, lookups and correlation groups", () => {
		const risk = loadRiskConfig(FIXTURE_DIR);
		expect(risk.riskPerTrade).toBe(0.02);
		expect(risk.maxPositions).toBe(3);
		expect(risk.maxCorrelated).toBe(1);
		expect(risk.symbolTypeBySymbol).toEqual({ XAUUSD: "metal" });
		expect(risk.pipValueBySymbolType).toEqual({ forex: 10, metal: 1 });
		expect(risk.correlationGroups).toEqual([["EURUSD", "GBPUSD"]]);
		expect(risk.minLot).toBe(0.01);
		expect(risk.maxLot).toBe(10);
	});

	it("rejects a minimum lot above the maximum", () => {
		expect(() => loadRiskConfig(FIXTURE_DIR, "inverted-lots")).toThrowError(
			/risk.minLot \(5\) exceeds risk.maxLot \(1\)/
		);
	});
});

describe("loadEnvConfig", () => {
	const touched = [
		"EXCHANGE_ID",
		"POLL_INTERVAL_MS",
		"EXECUTION_MODE",
		"PAPER_STARTING_BALANCE",
	];

	afterEach(() => {
		for (const key of touched) {
			delete process.env[key];
		}
	});

	it("loads values from the env file and applies defaults", () => {
		delete process.env.EXCHANGE_ID;
		delete process.env.POLL_INTERVAL_MS;
		const env = loadEnvConfig(path.join(FIXTURE_DIR, "test.env"));
		expect(env.exchangeId).toBe("binance");
		expect(env.pollIntervalMs).toBe(60_000);
		expect(env.executionMode).toBe("paper");
		expect(env.startingBalance).toBe(10_000);
	});

	it("rejects a non-numeric starting balance", () => {
		process.env.PAPER_STARTING_BALANCE = "lots";
		expect(() =>
			loadEnvConfig(path.join(FIXTURE_DIR, "missing.env"))
		).toThrowError(/PAPER_STARTING_BALANCE must be a positive number/);
	});
});
