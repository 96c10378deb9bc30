import { describe, expect, it } from "vitest";
import { normalizeLevel, sanitizeValue } from "./logger";

describe("logger helpers", () => {
	it("falls back to info for unknown levels", () => {
		expect(normalizeLevel(undefined)).toBe("info");
		expect(normalizeLevel("WARN")).toBe("warn");
		expect(normalizeLevel("verbose")).toBe("info");
	});

	it("sanitizes values that JSON cannot carry", () => {
		const circular: Record<string, unknown> = { name: "root" };
		circular.self = circular;
		expect(sanitizeValue(circular)).toEqual({
			name: "root",
			self: "[circular]",
		});
		expect(sanitizeValue(Number.NaN)).toBe("NaN");
		expect(sanitizeValue(10n)).toBe("10");
		expect(sanitizeValue(new Date(Date.UTC(2024, 0, 1)))).toBe(
			"2024-01-01T00:00:00.000Z"
		);
	});
});
