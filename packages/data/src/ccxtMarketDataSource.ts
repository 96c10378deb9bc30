import type { OHLCV } from "ccxt";
import {
	Bar,
	MarketDataSource,
	ModuleLogger,
	NoDataAvailableError,
	createLogger,
	describeError,
	toMarketSymbol,
} from "@fxdesk/core";

import { mapCcxtRowToBar, normalizeBars } from "./utils/ccxtMapper";

/** The read side of a ccxt exchange. A ccxt `Exchange` instance satisfies it. */
export interface OhlcvClient {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface CcxtMarketDataSourceOptions {
	client: OhlcvClient;
	logger?: ModuleLogger;
}

export class CcxtMarketDataSource implements MarketDataSource {
	private readonly logger: ModuleLogger;

	constructor(private readonly options: CcxtMarketDataSourceOptions) {
		this.logger = options.logger ?? createLogger("data:ccxt");
	}

	async getBars(symbol: string, timeframe: string, count: number): Promise<Bar[]> {
		const marketSymbol = toMarketSymbol(symbol);
		let rows: OHLCV[];
		try {
			rows = await this.options.client.fetchOHLCV(
				marketSymbol,
				timeframe,
				undefined,
				count
			);
		} catch (error) {
			throw new NoDataAvailableError(symbol, timeframe, describeError(error));
		}

		const mapped = rows.map(mapCcxtRowToBar);
		const bars = mapped.filter((bar): bar is Bar => bar !== null);
		if (bars.length < mapped.length) {
			this.logger.warn("ohlcv_rows_dropped", {
				symbol: marketSymbol,
				timeframe,
				dropped: mapped.length - bars.length,
			});
		}

		const series = normalizeBars(bars).slice(-count);
		if (!series.length) {
			throw new NoDataAvailableError(symbol, timeframe);
		}

		this.logger.debug("bars_loaded", {
			symbol: marketSymbol,
			timeframe,
			count: series.length,
			lastTimestamp: series[series.length - 1].timestamp,
		});
		return series;
	}
}
