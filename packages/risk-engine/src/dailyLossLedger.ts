import { utcDayKey } from "@fxdesk/core";

export interface TradeOutcome {
	symbol: string;
	/** Realised profit in account currency; losses are negative. */
	profit: number;
	closedAt: number;
}

/**
 * Closed-trade outcomes for the current UTC day. Everything recorded on an
 * earlier day is dropped in one step the first time a later day is seen.
 */
export class DailyLossLedger {
	private dayKey: string;
	private outcomes: TradeOutcome[] = [];

	constructor(private readonly now: () => number = Date.now) {
		this.dayKey = utcDayKey(this.now());
	}

	/** Returns true when the day changed and the ledger was cleared. */
	rollover(): boolean {
		const today = utcDayKey(this.now());
		if (today === this.dayKey) {
			return false;
		}
		this.dayKey = today;
		this.outcomes = [];
		return true;
	}

	record(outcome: TradeOutcome): void {
		this.outcomes = [...this.outcomes, Object.freeze({ ...outcome })];
	}

	/** Sum of losing trades, zero or negative. */
	totalLoss(): number {
		return this.outcomes.reduce(
			(acc, outcome) => (outcome.profit < 0 ? acc + outcome.profit : acc),
			0
		);
	}

	get day(): string {
		return this.dayKey;
	}
}
