import { describe, expect, it } from "vitest";
import { resolveStrategySelection } from "./selection";

describe("resolveStrategySelection", () => {
	it("prefers the cli value over the environment", () => {
		const result = resolveStrategySelection({
			requestedValue: " Crossover ",
			envValue: "breakout",
			defaultStrategyId: "breakout",
		});
		expect(result.resolvedStrategyId).toBe("crossover");
		expect(result.source).toBe("cli");
		expect(result.invalidSources).toEqual([]);
	});

	it("falls through invalid values and reports them", () => {
		const result = resolveStrategySelection({
			requestedValue: "turtle",
			envValue: "crossover",
			defaultStrategyId: "breakout",
		});
		expect(result.resolvedStrategyId).toBe("crossover");
		expect(result.source).toBe("env");
		expect(result.invalidSources).toEqual([{ source: "cli", value: "turtle" }]);
	});

	it("uses the default when nothing is requested", () => {
		const result = resolveStrategySelection({ defaultStrategyId: "breakout" });
		expect(result).toEqual({
			resolvedStrategyId: "breakout",
			source: "default",
			invalidSources: [],
		});
	});
});
