import { StrategyId, isStrategyId } from "./ids";

export type StrategySelectionSource = "cli" | "env";

export interface StrategySelectionInput {
	requestedValue?: string;
	envValue?: string;
	defaultStrategyId: StrategyId;
}

export interface StrategySelectionResult {
	resolvedStrategyId: StrategyId;
	source: StrategySelectionSource | "default";
	invalidSources: { source: StrategySelectionSource; value: string }[];
}

export const normalizeStrategyInput = (value?: string): string | undefined => {
	const trimmed = value?.trim();
	return trimmed ? trimmed.toLowerCase() : undefined;
};

/**
 * CLI flag wins over the environment, which wins over the configured default.
 * Unknown ids are reported instead of thrown so the caller can warn.
 */
export const resolveStrategySelection = (
	input: StrategySelectionInput
): StrategySelectionResult => {
	const invalidSources: StrategySelectionResult["invalidSources"] = [];
	const candidates: [StrategySelectionSource, string | undefined][] = [
		["cli", normalizeStrategyInput(input.requestedValue)],
		["env", normalizeStrategyInput(input.envValue)],
	];

	for (const [source, value] of candidates) {
		if (!value) {
			continue;
		}
		if (isStrategyId(value)) {
			return { resolvedStrategyId: value, source, invalidSources };
		}
		invalidSources.push({ source, value });
	}

	return {
		resolvedStrategyId: input.defaultStrategyId,
		source: "default",
		invalidSources,
	};
};
