import { ModuleLogger, describeError, toPlainSymbol } from "@fxdesk/core";

import type { TickResult, TickRunner } from "./Coordinator";
import { runtimeLogger } from "./runtimeShared";

export type CycleResult = TickResult | { status: "error"; symbol: string; reason: string };

export interface RunCycleOptions {
	signal?: AbortSignal;
	logger?: ModuleLogger;
}

/**
 * Evaluates each symbol once, in order. A failing symbol is reported and the
 * cycle moves on; an aborted signal stops it before the next symbol.
 */
export const runCycle = async (
	runner: TickRunner,
	symbols: readonly string[],
	options: RunCycleOptions = {}
): Promise<CycleResult[]> => {
	const logger = options.logger ?? runtimeLogger;
	const results: CycleResult[] = [];
	const seen = new Set<string>();

	for (const raw of symbols) {
		if (options.signal?.aborted) {
			logger.info("cycle_aborted", { evaluated: results.length });
			break;
		}
		const symbol = toPlainSymbol(raw);
		if (seen.has(symbol)) {
			continue;
		}
		seen.add(symbol);

		try {
			results.push(await runner.runTick(symbol));
		} catch (error) {
			const reason = describeError(error);
			logger.error("tick_failed", { symbol, reason });
			results.push({ status: "error", symbol, reason });
		}
	}
	return results;
};

export const summarizeCycle = (
	results: readonly CycleResult[]
): Partial<Record<CycleResult["status"], number>> => {
	const summary: Partial<Record<CycleResult["status"], number>> = {};
	for (const result of results) {
		summary[result.status] = (summary[result.status] ?? 0) + 1;
	}
	return summary;
};
