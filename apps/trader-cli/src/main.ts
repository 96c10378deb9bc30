import {
	ConfigurationError,
	ExecutionMode,
	FxdeskConfig,
	OrderExecutionGateway,
	createLogger,
} from "@fxdesk/core";
import { CcxtMarketDataSource, createCcxtExchange } from "@fxdesk/data";
import type { Exchange } from "ccxt";
import {
	LiveExecutionGateway,
	PaperAccount,
	PaperExecutionGateway,
} from "@fxdesk/execution-engine";
import { RiskManager } from "@fxdesk/risk-engine";
import {
	Coordinator,
	loadRuntimeConfig,
	logRiskConfig,
	logTraderConfig,
	startTrader,
} from "@fxdesk/runtime";
import { createStrategy } from "@fxdesk/strategy-engine";

import { getFlag, getStringArg, parseCliArgs } from "./args";

const logger = createLogger("trader-cli");

const createGateway = (
	mode: ExecutionMode,
	config: FxdeskConfig,
	exchange: Exchange,
	riskManager: RiskManager
): OrderExecutionGateway => {
	if (mode === "live") {
		return new LiveExecutionGateway({
			client: exchange,
			currency: config.env.accountCurrency,
		});
	}
	return new PaperExecutionGateway({
		account: new PaperAccount(
			config.env.startingBalance,
			config.env.accountCurrency
		),
		pipValue: (symbol) => riskManager.pipValueFor(symbol),
	});
};

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	const { config, selection } = loadRuntimeConfig({
		requestedStrategyId: getStringArg(args, "strategy"),
		configDir: getStringArg(args, "config-dir"),
		envPath: getStringArg(args, "env"),
		riskProfile: getStringArg(args, "risk"),
	});
	logTraderConfig(config);
	logRiskConfig(config);

	const mode = config.env.executionMode;
	const apiKey = process.env.EXCHANGE_API_KEY;
	const secret = process.env.EXCHANGE_SECRET;
	if (mode === "live" && (!apiKey || !secret)) {
		throw new ConfigurationError(
			"Live execution needs EXCHANGE_API_KEY and EXCHANGE_SECRET",
			"EXECUTION_MODE"
		);
	}

	const exchange = createCcxtExchange(config.env.exchangeId, { apiKey, secret });
	const riskManager = new RiskManager(config.risk);
	const coordinator = new Coordinator({
		strategy: createStrategy(config.strategy),
		marketData: new CcxtMarketDataSource({ client: exchange }),
		execution: createGateway(mode, config, exchange, riskManager),
		riskManager,
	});

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals) => {
		logger.info("cli_shutdown_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	logger.info("cli_starting", {
		strategyId: selection.resolvedStrategyId,
		strategySource: selection.source,
		executionMode: mode,
		exchangeId: config.env.exchangeId,
		symbols: config.strategy.symbols,
	});

	await startTrader({
		runner: coordinator,
		symbols: config.strategy.symbols,
		pollIntervalMs: config.env.pollIntervalMs,
		signal: controller.signal,
		maxCycles: getFlag(args, "once") ? 1 : undefined,
	});
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
