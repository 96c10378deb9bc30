import type { Bar } from "../types";

/**
 * Read-only bar provider consumed by the coordinator.
 *
 * Implementations return bars in chronological order and throw
 * `NoDataAvailableError` instead of returning an empty or partial series.
 */
export interface MarketDataSource {
	/**
	 * @param symbol - Instrument symbol (e.g. "EURUSD")
	 * @param timeframe - Timeframe string (e.g. "1h", "4h")
	 * @param count - Number of most recent bars wanted
	 */
	getBars(symbol: string, timeframe: string, count: number): Promise<Bar[]>;
}
