import { ModuleLogger, createSignal } from "@fxdesk/core";
import { describe, expect, it, vi } from "vitest";

import type { TickRunner } from "./Coordinator";
import { startTrader } from "./startTrader";

const createTestLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const createRunner = () => {
	const calls: string[] = [];
	const runner: TickRunner = {
		runTick: async (symbol) => {
			calls.push(symbol);
			return {
				status: "no_action",
				symbol,
				signal: createSignal(symbol, "NONE", { reason: "no_signal" }, 0),
			};
		},
	};
	return { calls, runner };
};

describe("startTrader", () => {
	it("sleeps the poll interval between cycles", async () => {
		const { calls, runner } = createRunner();
		const sleep = vi.fn(async () => undefined);

		const cycles = await startTrader({
			runner,
			symbols: ["EURUSD"],
			pollIntervalMs: 60_000,
			maxCycles: 2,
			sleep,
			logger: createTestLogger(),
		});

		expect(cycles).toBe(2);
		expect(calls).toEqual(["EURUSD", "EURUSD"]);
		expect(sleep).toHaveBeenCalledTimes(1);
		expect(sleep).toHaveBeenCalledWith(60_000, undefined);
	});

	it("stops when aborted during the wait", async () => {
		const { calls, runner } = createRunner();
		const controller = new AbortController();

		const cycles = await startTrader({
			runner,
			symbols: ["EURUSD", "GBPUSD"],
			pollIntervalMs: 60_000,
			signal: controller.signal,
			sleep: async () => controller.abort(),
			logger: createTestLogger(),
		});

		expect(cycles).toBe(1);
		expect(calls).toEqual(["EURUSD", "GBPUSD"]);
	});

	it("does not run when already aborted", async () => {
		const { calls, runner } = createRunner();
		const controller = new AbortController();
		controller.abort();

		const cycles = await startTrader({
			runner,
			symbols: ["EURUSD"],
			pollIntervalMs: 60_000,
			signal: controller.signal,
			logger: createTestLogger(),
		});

		expect(cycles).toBe(0);
		expect(calls).toEqual([]);
	});

	it("wakes from the default sleep on abort", async () => {
		const { runner } = createRunner();
		const controller = new AbortController();
		const logger = createTestLogger();
		vi.mocked(logger.info).mockImplementation((event) => {
			if (event === "cycle_complete") {
				setImmediate(() => controller.abort());
			}
		});

		const cycles = await startTrader({
			runner,
			symbols: ["EURUSD"],
			pollIntervalMs: 3_600_000,
			signal: controller.signal,
			logger,
		});

		expect(cycles).toBe(1);
	});
});
