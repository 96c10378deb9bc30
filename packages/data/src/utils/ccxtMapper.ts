import type { OHLCV } from "ccxt";
import type { Bar } from "@fxdesk/core";

const toFinite = (value: unknown): number | null =>
	typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Maps one ccxt OHLCV row to a Bar. Rows with a missing or non-finite price
 * or timestamp map to null; a missing volume reads as 0.
 */
export const mapCcxtRowToBar = (row: OHLCV): Bar | null => {
	const [timestamp, open, high, low, close, volume] = row;
	const values = [timestamp, open, high, low, close].map(toFinite);
	const [ts, o, h, l, c] = values;
	if (ts === null || o === null || h === null || l === null || c === null) {
		return null;
	}
	return {
		timestamp: ts,
		open: o,
		high: h,
		low: l,
		close: c,
		volume: toFinite(volume) ?? 0,
	};
};

/** Chronological, one bar per timestamp (the latest row wins). */
export const normalizeBars = (bars: readonly Bar[]): Bar[] => {
	const byTimestamp = new Map<number, Bar>();
	for (const bar of bars) {
		byTimestamp.set(bar.timestamp, bar);
	}
	return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
};
