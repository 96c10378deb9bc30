import * as ccxt from "ccxt";
import type { Exchange } from "ccxt";
import { ConfigurationError } from "@fxdesk/core";

export const SUPPORTED_EXCHANGES = ["kraken", "binance", "bitstamp"] as const;

export type SupportedExchangeId = (typeof SUPPORTED_EXCHANGES)[number];

export interface ExchangeCredentials {
	apiKey?: string;
	secret?: string;
}

export const createCcxtExchange = (
	exchangeId: string,
	credentials: ExchangeCredentials = {}
): Exchange => {
	const options = {
		apiKey: credentials.apiKey,
		secret: credentials.secret,
		enableRateLimit: true,
	};
	switch (exchangeId.toLowerCase()) {
		case "kraken":
			return new ccxt.kraken(options);
		case "binance":
			return new ccxt.binance(options);
		case "bitstamp":
			return new ccxt.bitstamp(options);
		default:
			throw new ConfigurationError(
				`Unsupported exchange "${exchangeId}", expected one of ${SUPPORTED_EXCHANGES.join(", ")}`,
				"EXCHANGE_ID"
			);
	}
};
