import { describe, expect, it } from "vitest";
import { getFlag, getStringArg, parseCliArgs } from "./args";

describe("parseCliArgs", () => {
	it("reads spaced, inline and bare flags", () => {
		const args = parseCliArgs([
			"--strategy",
			"crossover",
			"--config-dir=./conf",
			"--once",
			"stray",
		]);

		expect(args).toEqual({
			strategy: "crossover",
			"config-dir": "./conf",
			once: "stray",
		});
	});

	it("treats a flag followed by another flag as boolean", () => {
		const args = parseCliArgs(["--once", "--strategy", "breakout"]);

		expect(getFlag(args, "once")).toBe(true);
		expect(getStringArg(args, "strategy")).toBe("breakout");
		expect(getStringArg(args, "once")).toBeUndefined();
		expect(getStringArg(args, "missing")).toBeUndefined();
	});
});
