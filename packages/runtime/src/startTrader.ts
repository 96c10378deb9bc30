import { setTimeout as delay } from "node:timers/promises";
import { ModuleLogger } from "@fxdesk/core";

import type { TickRunner } from "./Coordinator";
import { runCycle, summarizeCycle } from "./runCycle";
import { runtimeLogger } from "./runtimeShared";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TraderLoopOptions {
	runner: TickRunner;
	symbols: readonly string[];
	pollIntervalMs: number;
	signal?: AbortSignal;
	/** Stop after this many cycles; runs until aborted when unset. */
	maxCycles?: number;
	logger?: ModuleLogger;
	sleep?: Sleep;
}

const abortableSleep: Sleep = async (ms, signal) => {
	try {
		await delay(ms, undefined, { signal });
	} catch (error) {
		if (signal?.aborted) {
			return;
		}
		throw error;
	}
};

/** Runs a cycle every `pollIntervalMs` and resolves with the cycle count. */
export const startTrader = async (options: TraderLoopOptions): Promise<number> => {
	const logger = options.logger ?? runtimeLogger;
	const sleep = options.sleep ?? abortableSleep;
	const { signal, maxCycles } = options;
	let cycles = 0;

	logger.info("trader_started", {
		symbols: options.symbols,
		pollIntervalMs: options.pollIntervalMs,
		maxCycles: maxCycles ?? null,
	});

	while (!signal?.aborted) {
		const results = await runCycle(options.runner, options.symbols, {
			signal,
			logger,
		});
		cycles += 1;
		logger.info("cycle_complete", {
			cycle: cycles,
			summary: summarizeCycle(results),
		});
		if (maxCycles !== undefined && cycles >= maxCycles) {
			break;
		}
		if (signal?.aborted) {
			break;
		}
		await sleep(options.pollIntervalMs, signal);
	}

	logger.info("trader_stopped", { cycles });
	return cycles;
};
