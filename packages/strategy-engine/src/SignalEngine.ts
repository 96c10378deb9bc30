import {
	ModuleLogger,
	PositionDirection,
	Signal,
	SignalKind,
	SignalMeta,
	createSignal,
} from "@fxdesk/core";
import type { IndicatorSnapshot } from "@fxdesk/indicators";

/**
 * Turns one indicator snapshot into one decision for a symbol. Engines hold
 * no per-symbol state: the caller passes the current direction every time.
 */
export interface SignalEngine {
	evaluate(
		symbol: string,
		snapshot: IndicatorSnapshot,
		currentDirection: PositionDirection
	): Signal;
}

export interface SignalEngineOptions {
	logger?: ModuleLogger;
}

export const noSignal = (
	symbol: string,
	reason: string,
	timestamp: number
): Signal => createSignal(symbol, "NONE", { reason }, timestamp);

export const signalFor = (
	symbol: string,
	kind: SignalKind,
	meta: SignalMeta,
	timestamp: number
): Signal => createSignal(symbol, kind, meta, timestamp);

export const allFinite = (values: readonly number[]): boolean =>
	values.every((value) => Number.isFinite(value));

export const holdingReason = (direction: PositionDirection): string => {
	switch (direction) {
		case "LONG":
			return "holding_long";
		case "SHORT":
			return "holding_short";
		default:
			return "no_signal";
	}
};
