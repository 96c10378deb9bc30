export const STRATEGY_IDS = ["breakout", "crossover"] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const DEFAULT_STRATEGY_ID: StrategyId = "breakout";

export const isStrategyId = (value: unknown): value is StrategyId => {
	return (
		typeof value === "string" &&
		(STRATEGY_IDS as readonly string[]).includes(value)
	);
};
