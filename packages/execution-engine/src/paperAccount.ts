import { ActiveDirection } from "@fxdesk/core";

export interface ClosedTrade {
	symbol: string;
	direction: ActiveDirection;
	size: number;
	entryPrice: number;
	exitPrice: number;
	pips: number;
	realizedPnl: number;
	closedAt: number;
}

export interface TradeTally {
	total: number;
	wins: number;
	losses: number;
	breakeven: number;
}

export interface PaperAccountSnapshot {
	currency: string;
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: TradeTally;
	lastTrade?: ClosedTrade;
}

export class PaperAccount {
	private balance: number;
	private maxEquity: number;
	private readonly trades: TradeTally = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};
	private lastTrade?: ClosedTrade;

	constructor(
		private readonly startingBalance: number,
		readonly currency = "USD"
	) {
		if (!Number.isFinite(startingBalance) || startingBalance <= 0) {
			throw new Error(
				`Paper account needs a positive starting balance, got ${startingBalance}`
			);
		}
		this.balance = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(trade: ClosedTrade): PaperAccountSnapshot {
		this.balance += trade.realizedPnl;
		this.trades.total += 1;

		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.lastTrade = trade;
		return this.snapshot();
	}

	snapshot(unrealizedPnl = 0): PaperAccountSnapshot {
		const equity = this.balance + unrealizedPnl;
		this.maxEquity = Math.max(this.maxEquity, equity);

		return {
			currency: this.currency,
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxEquity - equity,
			trades: { ...this.trades },
			lastTrade: this.lastTrade,
		};
	}
}
