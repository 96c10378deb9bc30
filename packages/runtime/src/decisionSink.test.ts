import { ModuleLogger, createSignal } from "@fxdesk/core";
import type { BreakoutSnapshot } from "@fxdesk/indicators";
import { describe, expect, it, vi } from "vitest";

import { createLogDecisionSink, toDecisionEvent } from "./decisionSink";

const snapshot: BreakoutSnapshot = {
	kind: "breakout",
	timestamp: 1_700_000_000_000,
	close: 1.2,
	entryHigh: 1.19,
	entryLow: 1.1,
	exitHigh: 1.19,
	exitLow: 1.15,
	atr: 0.01,
	volFilterPassed: true,
	trendUp: true,
	trendDown: false,
};

describe("decision events", () => {
	it("flattens the snapshot into numeric and boolean indicators", () => {
		const signal = createSignal(
			"EURUSD",
			"ENTER_LONG",
			{ reason: "breakout_long", entryPrice: 1.2 },
			snapshot.timestamp
		);

		expect(toDecisionEvent(signal, snapshot)).toEqual({
			symbol: "EURUSD",
			kind: "ENTER_LONG",
			reason: "breakout_long",
			indicators: {
				close: 1.2,
				entryHigh: 1.19,
				entryLow: 1.1,
				exitHigh: 1.19,
				exitLow: 1.15,
				atr: 0.01,
				volFilterPassed: true,
				trendUp: true,
				trendDown: false,
			},
			timestamp: 1_700_000_000_000,
		});
	});

	it("logs each event as strategy_decision", () => {
		const logger: ModuleLogger = {
			log: vi.fn(),
			debug: vi.fn(),
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
		};
		const event = {
			symbol: "EURUSD",
			kind: "NONE" as const,
			reason: "no_signal",
			indicators: { atr: 0.01 },
			timestamp: 0,
		};

		void createLogDecisionSink(logger).publish(event);

		expect(logger.info).toHaveBeenCalledWith("strategy_decision", event);
	});
});
