import type { OHLCV } from "ccxt";
import { NoDataAvailableError } from "@fxdesk/core";
import { describe, expect, it } from "vitest";
import { CcxtMarketDataSource, OhlcvClient } from "./ccxtMarketDataSource";
import { mapCcxtRowToBar } from "./utils/ccxtMapper";

const HOUR_MS = 3_600_000;
const START = Date.UTC(2024, 2, 18);

class StaticOhlcvClient implements OhlcvClient {
	readonly requests: { symbol: string; timeframe?: string; limit?: number }[] = [];

	constructor(private readonly rows: OHLCV[] | Error) {}

	async fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]> {
		void since;
		this.requests.push({ symbol, timeframe, limit });
		if (this.rows instanceof Error) {
			throw this.rows;
		}
		return this.rows;
	}
}

const row = (index: number, close: number): OHLCV => [
	START + index * HOUR_MS,
	close,
	close + 0.001,
	close - 0.001,
	close,
	100,
];

describe("CcxtMarketDataSource", () => {
	it("requests the exchange symbol and returns chronological bars", async () => {
		const client = new StaticOhlcvClient([row(1, 1.1), row(0, 1.09), row(2, 1.11)]);
		const source = new CcxtMarketDataSource({ client });

		const bars = await source.getBars("EURUSD", "1h", 3);

		expect(client.requests).toEqual([
			{ symbol: "EUR/USD", timeframe: "1h", limit: 3 },
		]);
		expect(bars.map((bar) => bar.close)).toEqual([1.09, 1.1, 1.11]);
	});

	it("keeps one bar per timestamp and only the latest count", async () => {
		const client = new StaticOhlcvClient([
			row(0, 1.0),
			row(1, 1.01),
			row(1, 1.02),
			row(2, 1.03),
		]);
		const source = new CcxtMarketDataSource({ client });
		const bars = await source.getBars("EURUSD", "1h", 2);
		expect(bars.map((bar) => bar.close)).toEqual([1.02, 1.03]);
	});

	it("drops rows with missing prices", async () => {
		const client = new StaticOhlcvClient([
			row(0, 1.0),
			[START + HOUR_MS, 1.01, undefined, 1.0, 1.01, 5],
		]);
		const source = new CcxtMarketDataSource({ client });
		const bars = await source.getBars("EURUSD", "1h", 10);
		expect(bars).toHaveLength(1);
	});

	it("throws NoDataAvailableError for an empty response", async () => {
		const source = new CcxtMarketDataSource({
			client: new StaticOhlcvClient([]),
		});
		await expect(source.getBars("EURUSD", "4h", 10)).rejects.toThrowError(
			new NoDataAvailableError("EURUSD", "4h").message
		);
	});

	it("wraps exchange failures in NoDataAvailableError", async () => {
		const source = new CcxtMarketDataSource({
			client: new StaticOhlcvClient(new Error("rate limited")),
		});
		await expect(source.getBars("GBPUSD", "1h", 10)).rejects.toBeInstanceOf(
			NoDataAvailableError
		);
	});
});

describe("mapCcxtRowToBar", () => {
	it("reads a missing volume as zero", () => {
		expect(mapCcxtRowToBar([START, 1, 2, 0.5, 1.5, undefined])).toEqual({
			timestamp: START,
			open: 1,
			high: 2,
			low: 0.5,
			close: 1.5,
			volume: 0,
		});
	});
});
