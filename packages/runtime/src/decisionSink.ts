import { ModuleLogger, Signal, SignalKind } from "@fxdesk/core";
import type { IndicatorSnapshot } from "@fxdesk/indicators";

import { runtimeLogger } from "./runtimeShared";

export type IndicatorValues = Record<string, number | boolean>;

export interface DecisionEvent {
	symbol: string;
	kind: SignalKind;
	reason: string;
	indicators: IndicatorValues;
	timestamp: number;
}

/** Receives one event per evaluated signal, NONE included. */
export interface DecisionSink {
	publish(event: DecisionEvent): void | Promise<void>;
}

export const snapshotIndicators = (
	snapshot: IndicatorSnapshot
): IndicatorValues => {
	const values: IndicatorValues = {};
	for (const [key, value] of Object.entries(snapshot)) {
		if (key === "timestamp") {
			continue;
		}
		if (typeof value === "number" || typeof value === "boolean") {
			values[key] = value;
		}
	}
	return values;
};

export const toDecisionEvent = (
	signal: Signal,
	snapshot: IndicatorSnapshot
): DecisionEvent => ({
	symbol: signal.symbol,
	kind: signal.kind,
	reason: signal.meta.reason,
	indicators: snapshotIndicators(snapshot),
	timestamp: signal.timestamp,
});

export const createLogDecisionSink = (
	logger: ModuleLogger = runtimeLogger
): DecisionSink => ({
	publish: (event) => {
		logger.info("strategy_decision", { ...event });
	},
});
