import { ModuleLogger, StrategyConfig } from "@fxdesk/core";
import { IndicatorPipeline, createIndicatorPipeline } from "@fxdesk/indicators";

import { BreakoutSignalEngine } from "./BreakoutSignalEngine";
import { CrossoverSignalEngine } from "./CrossoverSignalEngine";
import { SessionGatedSignalEngine } from "./SessionGatedSignalEngine";
import { SignalEngine } from "./SignalEngine";

export interface StrategyDependencies {
	logger?: ModuleLogger;
}

/** The pipeline and engine that belong together for one strategy id. */
export interface Strategy {
	config: StrategyConfig;
	pipeline: IndicatorPipeline;
	engine: SignalEngine;
}

const createSignalEngine = (
	config: StrategyConfig,
	deps: StrategyDependencies
): SignalEngine => {
	switch (config.id) {
		case "breakout":
			return new BreakoutSignalEngine(config, { logger: deps.logger });
		case "crossover":
			return new CrossoverSignalEngine(config, { logger: deps.logger });
	}
};

export const createStrategy = (
	config: StrategyConfig,
	deps: StrategyDependencies = {}
): Strategy => {
	const engine = createSignalEngine(config, deps);
	return {
		config,
		pipeline: createIndicatorPipeline(config),
		engine: config.session.enabled
			? new SessionGatedSignalEngine(engine, config.session)
			: engine,
	};
};
