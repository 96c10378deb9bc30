/**
 * Raised while loading or constructing components, before any evaluation
 * runs. Carries the offending field so the config file can be fixed.
 */
export class ConfigurationError extends Error {
	constructor(
		message: string,
		readonly field?: string
	) {
		super(message);
		this.name = "ConfigurationError";
	}
}

export class MalformedBarError extends Error {
	constructor(
		readonly index: number,
		readonly field: string,
		readonly value: unknown
	) {
		super(
			`Malformed bar at index ${index}: field "${field}" must be a finite number, got ${String(value)}`
		);
		this.name = "MalformedBarError";
	}
}

export class NoDataAvailableError extends Error {
	constructor(
		readonly symbol: string,
		readonly timeframe: string,
		detail?: string
	) {
		super(
			`No bars available for ${symbol} ${timeframe}${detail ? `: ${detail}` : ""}`
		);
		this.name = "NoDataAvailableError";
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
