import {
	ActiveDirection,
	Bar,
	ConfigurationError,
	ExecutionOutcome,
	ExecutionSuccess,
	FLAT_POSITION,
	MarketDataSource,
	ModuleLogger,
	NoDataAvailableError,
	OrderExecutionGateway,
	OrderRequest,
	PositionState,
	Signal,
	createSignal,
	describeError,
	directionForEntry,
	isEntrySignal,
	isExitSignal,
	orderSideFor,
	pipSize,
	protectiveExitFor,
	toPlainSymbol,
} from "@fxdesk/core";
import { RiskManager } from "@fxdesk/risk-engine";
import type { Strategy } from "@fxdesk/strategy-engine";

import {
	DecisionEvent,
	DecisionSink,
	createLogDecisionSink,
	toDecisionEvent,
} from "./decisionSink";
import { runtimeLogger } from "./runtimeShared";

export type RiskRejectionReason =
	| "daily_loss_limit"
	| "max_positions"
	| "correlation_limit";

export type TickResult =
	| { status: "evaluation_in_progress"; symbol: string }
	| { status: "no_data"; symbol: string; reason: string }
	| { status: "no_action"; symbol: string; signal: Signal }
	| {
			status: "rejected";
			symbol: string;
			signal: Signal;
			reason: RiskRejectionReason;
	  }
	| { status: "opened"; symbol: string; signal: Signal; position: PositionState }
	| { status: "closed"; symbol: string; signal: Signal; realizedPnl: number }
	| { status: "execution_failed"; symbol: string; signal: Signal; reason: string };

export type TickStatus = TickResult["status"];

/** Anything that can evaluate one symbol per call. */
export interface TickRunner {
	runTick(symbol: string): Promise<TickResult>;
}

export interface CoordinatorDependencies {
	strategy: Strategy;
	marketData: MarketDataSource;
	execution: OrderExecutionGateway;
	riskManager: RiskManager;
	sink?: DecisionSink;
	logger?: ModuleLogger;
	now?: () => number;
}

const EXIT_DIRECTION: Record<"CLOSE_LONG" | "CLOSE_SHORT", ActiveDirection> = {
	CLOSE_LONG: "LONG",
	CLOSE_SHORT: "SHORT",
};

/**
 * Drives one evaluation per symbol: fetch bars, settle stop and target against
 * the latest bar, compute the snapshot, ask the engine for a signal, then
 * route entries through the risk gates and the execution gateway. Position
 * state changes only after a successful fill.
 */
export class Coordinator implements TickRunner {
	private readonly positions = new Map<string, PositionState>();
	private readonly inFlight = new Set<string>();
	private readonly sink: DecisionSink;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;

	constructor(private readonly deps: CoordinatorDependencies) {
		const { config, pipeline } = deps.strategy;
		if (config.historyBars < pipeline.requiredBars) {
			throw new ConfigurationError(
				`historyBars (${config.historyBars}) is below the ${pipeline.requiredBars} bars the ${pipeline.id} pipeline needs`,
				"strategy.historyBars"
			);
		}
		this.logger = deps.logger ?? runtimeLogger;
		this.sink = deps.sink ?? createLogDecisionSink(this.logger);
		this.now = deps.now ?? Date.now;
	}

	getPosition(symbol: string): PositionState {
		const position = this.positions.get(toPlainSymbol(symbol));
		return position ? { ...position } : { ...FLAT_POSITION };
	}

	openSymbols(): string[] {
		return Array.from(this.positions.keys());
	}

	async runTick(symbol: string): Promise<TickResult> {
		const key = toPlainSymbol(symbol);
		if (this.inFlight.has(key)) {
			this.logger.debug("evaluation_in_progress", { symbol: key });
			return { status: "evaluation_in_progress", symbol: key };
		}
		this.inFlight.add(key);
		try {
			return await this.evaluate(key);
		} finally {
			this.inFlight.delete(key);
		}
	}

	private async evaluate(symbol: string): Promise<TickResult> {
		const { strategy, marketData } = this.deps;
		const { timeframe, historyBars } = strategy.config;

		let bars: Bar[];
		try {
			bars = await marketData.getBars(symbol, timeframe, historyBars);
		} catch (error) {
			if (error instanceof NoDataAvailableError) {
				this.logger.warn("market_data_error", {
					symbol,
					timeframe,
					message: error.message,
				});
				return { status: "no_data", symbol, reason: error.message };
			}
			throw error;
		}

		const position = this.getPosition(symbol);
		const latest = bars.length ? bars[bars.length - 1] : null;
		if (latest) {
			const protectiveClose = await this.enforceLevels(symbol, position, latest);
			if (protectiveClose) {
				return protectiveClose;
			}
		}

		const snapshot = strategy.pipeline.compute(bars);
		const signal = strategy.engine.evaluate(symbol, snapshot, position.direction);
		await this.publish(toDecisionEvent(signal, snapshot));

		if (isEntrySignal(signal.kind) && position.direction === "FLAT") {
			return this.openPosition(symbol, signal, bars);
		}
		if (isExitSignal(signal.kind)) {
			return this.closePosition(symbol, signal, position, lastClose(bars));
		}
		return { status: "no_action", symbol, signal };
	}

	private async publish(event: DecisionEvent): Promise<void> {
		try {
			await this.sink.publish(event);
		} catch (error) {
			this.logger.warn("decision_sink_failed", {
				symbol: event.symbol,
				kind: event.kind,
				message: describeError(error),
			});
		}
	}

	private async openPosition(
		symbol: string,
		signal: Signal,
		bars: readonly Bar[]
	): Promise<TickResult> {
		const { execution, riskManager } = this.deps;
		const direction = directionForEntry(signal.kind);
		if (direction === null) {
			return { status: "no_action", symbol, signal };
		}

		const account = await execution.getAccountSnapshot();
		const open = this.openSymbols();
		const rejection = this.checkRisk(symbol, account.balance, open);
		if (rejection) {
			this.logger.warn("entry_rejected", {
				symbol,
				kind: signal.kind,
				reason: rejection,
				balance: account.balance,
				openPositions: open.length,
			});
			return { status: "rejected", symbol, signal, reason: rejection };
		}

		const entryPrice = signal.meta.entryPrice ?? lastClose(bars);
		const stopLoss = signal.meta.stopLoss ?? entryPrice;
		const size = riskManager.calculatePositionSize(
			account.balance,
			entryPrice,
			stopLoss,
			symbol
		);
		const request: OrderRequest = {
			symbol,
			side: orderSideFor(direction),
			size,
			price: entryPrice,
			stopLoss,
			takeProfit: execution.supportsBracketOrders
				? signal.meta.profitTarget
				: undefined,
		};
		this.logger.info("order_intent", { ...request });

		const outcome = await this.submit(() => execution.placeOrder(request));
		if (!outcome.success) {
			this.logger.error("execution_error", {
				symbol,
				action: "open",
				reason: outcome.reason,
			});
			return {
				status: "execution_failed",
				symbol,
				signal,
				reason: outcome.reason,
			};
		}

		const state: PositionState = {
			direction,
			entryPrice: outcome.price ?? entryPrice,
			stopLoss,
			takeProfit: signal.meta.profitTarget,
			size,
			entryTime: signal.timestamp,
			orderId: outcome.orderId,
		};
		this.positions.set(symbol, state);
		this.logger.info("position_opened", { symbol, ...state });
		return { status: "opened", symbol, signal, position: { ...state } };
	}

	/**
	 * Bracket-holding gateways fill their own levels; for the rest the latest
	 * bar is checked here and the position closed at market.
	 */
	private async enforceLevels(
		symbol: string,
		position: PositionState,
		bar: Bar
	): Promise<TickResult | null> {
		const { direction } = position;
		if (direction === "FLAT") {
			return null;
		}
		const { execution } = this.deps;
		const exitKind = direction === "LONG" ? "CLOSE_LONG" : "CLOSE_SHORT";

		if (execution.supportsBracketOrders) {
			const fill = await execution.settleBrackets(symbol, bar);
			if (!fill) {
				return null;
			}
			const signal = createSignal(
				symbol,
				exitKind,
				{ reason: fill.trigger },
				bar.timestamp
			);
			await this.publishExit(signal, fill.price);
			return this.recordClose(symbol, signal, position, fill, fill.price);
		}

		const exit = protectiveExitFor(
			{ direction, stopLoss: position.stopLoss, takeProfit: position.takeProfit },
			bar
		);
		if (!exit) {
			return null;
		}
		const signal = createSignal(
			symbol,
			exitKind,
			{ reason: exit.reason },
			bar.timestamp
		);
		await this.publishExit(signal, exit.price);
		return this.closePosition(symbol, signal, position, exit.price);
	}

	private publishExit(signal: Signal, price: number): Promise<void> {
		return this.publish({
			symbol: signal.symbol,
			kind: signal.kind,
			reason: signal.meta.reason,
			indicators: { price },
			timestamp: signal.timestamp,
		});
	}

	private async closePosition(
		symbol: string,
		signal: Signal,
		position: PositionState,
		exitPrice: number
	): Promise<TickResult> {
		const exitKind = signal.kind === "CLOSE_LONG" ? "CLOSE_LONG" : "CLOSE_SHORT";
		if (position.direction !== EXIT_DIRECTION[exitKind]) {
			return { status: "no_action", symbol, signal };
		}

		const { execution } = this.deps;
		const outcome = await this.submit(() =>
			execution.closePosition(symbol, { price: exitPrice })
		);
		if (!outcome.success) {
			this.logger.error("execution_error", {
				symbol,
				action: "close",
				reason: outcome.reason,
			});
			return {
				status: "execution_failed",
				symbol,
				signal,
				reason: outcome.reason,
			};
		}
		return this.recordClose(symbol, signal, position, outcome, exitPrice);
	}

	private recordClose(
		symbol: string,
		signal: Signal,
		position: PositionState,
		outcome: ExecutionSuccess,
		exitPrice: number
	): TickResult {
		const realizedPnl =
			outcome.realizedPnl ??
			this.estimatePnl(symbol, position, outcome.price ?? exitPrice);
		this.deps.riskManager.recordTrade({
			symbol,
			profit: realizedPnl,
			closedAt: this.now(),
		});
		this.positions.delete(symbol);
		this.logger.info("position_closed", {
			symbol,
			reason: signal.meta.reason,
			orderId: outcome.orderId,
			realizedPnl,
		});
		return { status: "closed", symbol, signal, realizedPnl };
	}

	private checkRisk(
		symbol: string,
		balance: number,
		open: readonly string[]
	): RiskRejectionReason | null {
		const { riskManager } = this.deps;
		if (!riskManager.isTradingAllowed(balance)) {
			return "daily_loss_limit";
		}
		if (!riskManager.checkPositionLimit(open.length)) {
			return "max_positions";
		}
		if (!riskManager.checkCorrelationLimit(symbol, open)) {
			return "correlation_limit";
		}
		return null;
	}

	private async submit(
		action: () => Promise<ExecutionOutcome>
	): Promise<ExecutionOutcome> {
		try {
			return await action();
		} catch (error) {
			return { success: false, reason: describeError(error) };
		}
	}

	/** Used when the gateway does not report realized P&L itself. */
	private estimatePnl(
		symbol: string,
		position: PositionState,
		exitPrice: number
	): number {
		const move =
			position.direction === "SHORT"
				? position.entryPrice - exitPrice
				: exitPrice - position.entryPrice;
		return (
			(move / pipSize(symbol)) *
			this.deps.riskManager.pipValueFor(symbol) *
			position.size
		);
	}
}

const lastClose = (bars: readonly Bar[]): number =>
	bars.length ? bars[bars.length - 1].close : Number.NaN;
