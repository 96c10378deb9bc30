import {
	ModuleLogger,
	RiskConfig,
	createLogger,
	pipSize,
	toPlainSymbol,
	validateRiskConfig,
} from "@fxdesk/core";

import { DailyLossLedger, TradeOutcome } from "./dailyLossLedger";

export { DailyLossLedger } from "./dailyLossLedger";
export type { TradeOutcome } from "./dailyLossLedger";

/** Stop distances below this are treated as no stop at all. */
const MIN_PRICE_DIFF = 1e-10;
const DEFAULT_PIP_VALUE = 10;
/** Lots allowed per unit of balance: balance * 0.1 / (1000 * pipValue). */
const BALANCE_EXPOSURE = 0.1;
const CONTRACT_NOTIONAL = 1000;

export interface RiskManagerOptions {
	logger?: ModuleLogger;
	/** Clock used for the daily ledger, epoch milliseconds. */
	now?: () => number;
}

export interface TradeRecord {
	symbol: string;
	profit: number;
	closedAt?: number;
}

export class RiskManager {
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly ledger: DailyLossLedger;

	constructor(
		private readonly config: RiskConfig,
		options: RiskManagerOptions = {}
	) {
		validateRiskConfig(config);
		this.logger = options.logger ?? createLogger("risk-engine");
		this.now = options.now ?? Date.now;
		this.ledger = new DailyLossLedger(this.now);
	}

	calculatePositionSize(
		balance: number,
		entryPrice: number,
		stopPrice: number,
		symbol: string
	): number {
		const { minLot, maxLot } = this.config;
		const priceDiff = Math.abs(entryPrice - stopPrice);
		if (!Number.isFinite(priceDiff) || priceDiff < MIN_PRICE_DIFF) {
			return minLot;
		}

		const riskAmount = balance * this.config.riskPerTrade;
		const pipsAtRisk = priceDiff / pipSize(symbol);
		const pipValue = this.pipValueFor(symbol);
		const rawLots = riskAmount / (pipsAtRisk * pipValue);
		const balanceCap = (balance * BALANCE_EXPOSURE) / (CONTRACT_NOTIONAL * pipValue);
		const upper = Math.min(maxLot, balanceCap);

		const clamped = Math.max(minLot, Math.min(rawLots, upper));
		const lots = Math.max(minLot, Math.round(clamped * 100) / 100);

		this.logger.debug("position_size_calculated", {
			symbol,
			balance,
			entryPrice,
			stopPrice,
			pipsAtRisk,
			pipValue,
			rawLots,
			lots,
		});
		return lots;
	}

	isTradingAllowed(balance: number): boolean {
		this.rolloverIfNeeded();
		const dailyLoss = this.ledger.totalLoss();
		const limit = -balance * this.config.maxDailyLoss;
		if (dailyLoss <= limit) {
			this.logger.warn("daily_loss_limit_hit", {
				day: this.ledger.day,
				dailyLoss,
				limit,
			});
			return false;
		}
		return true;
	}

	checkCorrelationLimit(symbol: string, openSymbols: readonly string[]): boolean {
		const target = toPlainSymbol(symbol);
		const open = new Set(openSymbols.map(toPlainSymbol));

		for (const group of this.config.correlationGroups) {
			const members = group.map(toPlainSymbol);
			if (!members.includes(target)) {
				continue;
			}
			const correlatedOpen = members.filter((member) => open.has(member)).length;
			if (correlatedOpen >= this.config.maxCorrelated) {
				this.logger.info("correlation_limit_reached", {
					symbol: target,
					group: members,
					correlatedOpen,
					maxCorrelated: this.config.maxCorrelated,
				});
				return false;
			}
		}
		return true;
	}

	checkPositionLimit(openCount: number): boolean {
		return openCount < this.config.maxPositions;
	}

	recordTrade(trade: TradeRecord): void {
		this.rolloverIfNeeded();
		const outcome: TradeOutcome = {
			symbol: toPlainSymbol(trade.symbol),
			profit: trade.profit,
			closedAt: trade.closedAt ?? this.now(),
		};
		this.ledger.record(outcome);
		this.logger.info("trade_recorded", {
			...outcome,
			dailyLoss: this.ledger.totalLoss(),
		});
	}

	/** Summed losses of the current UTC day, zero or negative. */
	dailyLoss(): number {
		this.rolloverIfNeeded();
		return this.ledger.totalLoss();
	}

	private rolloverIfNeeded(): void {
		const previousDay = this.ledger.day;
		if (this.ledger.rollover()) {
			this.logger.info("daily_ledger_reset", {
				previousDay,
				day: this.ledger.day,
			});
		}
	}

	/** Account-currency value of one pip for one lot of `symbol`. */
	pipValueFor(symbol: string): number {
		const symbolType = this.config.symbolTypeBySymbol[toPlainSymbol(symbol)];
		if (symbolType === undefined) {
			return DEFAULT_PIP_VALUE;
		}
		return this.config.pipValueBySymbolType[symbolType] ?? DEFAULT_PIP_VALUE;
	}
}
