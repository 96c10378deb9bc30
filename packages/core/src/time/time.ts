/**
 * Pure time utilities for deterministic timestamp handling.
 * All functions operate on UTC epoch milliseconds only (no timezone conversion).
 */

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Parse a timeframe string to milliseconds.
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if the timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([mhd])$/);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (unit) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		default:
			return n * DAY_MS;
	}
};

/**
 * Calendar day of a timestamp, e.g. "2024-03-18".
 */
export const utcDayKey = (ts: number): string => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	return new Date(ts).toISOString().slice(0, 10);
};

export const utcHour = (ts: number): number => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	return Math.floor((((ts % DAY_MS) + DAY_MS) % DAY_MS) / HOUR_MS);
};
