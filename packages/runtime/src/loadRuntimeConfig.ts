import {
	ConfigurationError,
	DEFAULT_STRATEGY_ID,
	FxdeskConfig,
	StrategySelectionResult,
	loadEnvConfig,
	loadFxdeskConfig,
	resolveStrategySelection,
} from "@fxdesk/core";

import { runtimeLogger } from "./runtimeShared";

export interface LoadRuntimeConfigOptions {
	configDir?: string;
	envPath?: string;
	/** Strategy id from the command line; wins over TRADER_STRATEGY. */
	requestedStrategyId?: string;
	riskProfile?: string;
}

export interface LoadedRuntimeConfig {
	config: FxdeskConfig;
	selection: StrategySelectionResult;
}

export const loadRuntimeConfig = (
	options: LoadRuntimeConfigOptions = {}
): LoadedRuntimeConfig => {
	const env = loadEnvConfig(options.envPath);
	const selection = resolveStrategySelection({
		requestedValue: options.requestedStrategyId,
		envValue: env.strategyId,
		defaultStrategyId: DEFAULT_STRATEGY_ID,
	});
	for (const invalid of selection.invalidSources) {
		runtimeLogger.warn("invalid_strategy_selection", {
			source: invalid.source,
			value: invalid.value,
			fallback: selection.resolvedStrategyId,
		});
	}

	const config = loadFxdeskConfig({
		configDir: options.configDir,
		envPath: options.envPath,
		strategyProfile: selection.resolvedStrategyId,
		riskProfile: options.riskProfile,
	});
	if (config.strategy.id !== selection.resolvedStrategyId) {
		throw new ConfigurationError(
			`Strategy profile "${selection.resolvedStrategyId}" declares id "${config.strategy.id}"`,
			"strategy.id"
		);
	}

	runtimeLogger.info("strategy_selected", {
		strategyId: selection.resolvedStrategyId,
		source: selection.source,
	});
	return { config, selection };
};
