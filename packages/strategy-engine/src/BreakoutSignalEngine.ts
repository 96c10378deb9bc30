import {
	BreakoutParams,
	ModuleLogger,
	PositionDirection,
	Signal,
	createLogger,
	validateBreakoutParams,
} from "@fxdesk/core";
import type { BreakoutSnapshot, IndicatorSnapshot } from "@fxdesk/indicators";

import {
	SignalEngine,
	SignalEngineOptions,
	allFinite,
	holdingReason,
	noSignal,
	signalFor,
} from "./SignalEngine";

/** Stops sit this many ATRs away from the entry. */
const STOP_ATR_MULTIPLE = 2;

/**
 * Donchian channel breakout. Enters on a close beyond the entry channel when
 * volatility and trend agree, exits on a close through the shorter exit
 * channel.
 */
export class BreakoutSignalEngine implements SignalEngine {
	private readonly logger: ModuleLogger;

	constructor(
		private readonly params: BreakoutParams,
		options: SignalEngineOptions = {}
	) {
		validateBreakoutParams(params);
		this.logger = options.logger ?? createLogger("breakout-engine");
	}

	evaluate(
		symbol: string,
		snapshot: IndicatorSnapshot,
		currentDirection: PositionDirection
	): Signal {
		if (snapshot.kind !== "breakout" || !this.isComplete(snapshot)) {
			return noSignal(symbol, "insufficient_data", snapshot.timestamp);
		}

		const { close, atr, timestamp } = snapshot;

		this.logger.debug("breakout_context", {
			symbol,
			direction: currentDirection,
			close,
			entryHigh: snapshot.entryHigh,
			entryLow: snapshot.entryLow,
			exitHigh: snapshot.exitHigh,
			exitLow: snapshot.exitLow,
			atr,
			volFilterPassed: snapshot.volFilterPassed,
			trendUp: snapshot.trendUp,
			trendDown: snapshot.trendDown,
		});

		if (currentDirection === "LONG") {
			return close < snapshot.exitLow
				? signalFor(symbol, "CLOSE_LONG", { reason: "breakout_exit_long" }, timestamp)
				: noSignal(symbol, holdingReason(currentDirection), timestamp);
		}

		if (currentDirection === "SHORT") {
			return close > snapshot.exitHigh
				? signalFor(
						symbol,
						"CLOSE_SHORT",
						{ reason: "breakout_exit_short" },
						timestamp
					)
				: noSignal(symbol, holdingReason(currentDirection), timestamp);
		}

		if (close > snapshot.entryHigh && snapshot.volFilterPassed && snapshot.trendUp) {
			return signalFor(
				symbol,
				"ENTER_LONG",
				{
					reason: "breakout_long",
					entryPrice: close,
					stopLoss: close - STOP_ATR_MULTIPLE * atr,
					profitTarget:
						close + STOP_ATR_MULTIPLE * this.params.profitMultiplier * atr,
					atr,
				},
				timestamp
			);
		}

		if (close < snapshot.entryLow && snapshot.volFilterPassed && snapshot.trendDown) {
			return signalFor(
				symbol,
				"ENTER_SHORT",
				{
					reason: "breakout_short",
					entryPrice: close,
					stopLoss: close + STOP_ATR_MULTIPLE * atr,
					profitTarget:
						close - STOP_ATR_MULTIPLE * this.params.profitMultiplier * atr,
					atr,
				},
				timestamp
			);
		}

		return noSignal(symbol, "no_signal", timestamp);
	}

	private isComplete(snapshot: BreakoutSnapshot): boolean {
		return allFinite([
			snapshot.close,
			snapshot.entryHigh,
			snapshot.entryLow,
			snapshot.exitHigh,
			snapshot.exitLow,
			snapshot.atr,
		]);
	}
}
