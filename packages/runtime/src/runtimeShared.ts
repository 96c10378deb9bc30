import {
	FxdeskConfig,
	createLogger,
	getConfigMetadata,
} from "@fxdesk/core";

export const runtimeLogger = createLogger("trader-runtime");

export const logTraderConfig = (config: FxdeskConfig): void => {
	const { env, strategy } = config;
	runtimeLogger.info("trader_config", {
		strategyId: strategy.id,
		symbols: strategy.symbols,
		timeframe: strategy.timeframe,
		historyBars: strategy.historyBars,
		session: strategy.session,
		executionMode: env.executionMode,
		exchangeId: env.exchangeId,
		pollIntervalMs: env.pollIntervalMs,
		strategySource: getConfigMetadata(strategy),
	});
};

export const logRiskConfig = (config: FxdeskConfig): void => {
	const { risk } = config;
	runtimeLogger.info("risk_config", {
		riskPerTrade: risk.riskPerTrade,
		maxDailyLoss: risk.maxDailyLoss,
		maxPositions: risk.maxPositions,
		maxCorrelated: risk.maxCorrelated,
		correlationGroups: risk.correlationGroups,
		minLot: risk.minLot,
		maxLot: risk.maxLot,
		riskSource: getConfigMetadata(risk),
	});
};
