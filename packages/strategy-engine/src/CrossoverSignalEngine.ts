import {
	CrossoverParams,
	ModuleLogger,
	PositionDirection,
	Signal,
	createLogger,
	validateCrossoverParams,
} from "@fxdesk/core";
import type { CrossoverSnapshot, IndicatorSnapshot } from "@fxdesk/indicators";

import {
	SignalEngine,
	SignalEngineOptions,
	allFinite,
	holdingReason,
	noSignal,
	signalFor,
} from "./SignalEngine";

const RSI_MIDLINE = 50;

/**
 * EMA trend with a MACD histogram turn, confirmed by RSI, momentum and the
 * Bollinger midline.
 */
export class CrossoverSignalEngine implements SignalEngine {
	private readonly logger: ModuleLogger;

	constructor(
		private readonly params: CrossoverParams,
		options: SignalEngineOptions = {}
	) {
		validateCrossoverParams(params);
		this.logger = options.logger ?? createLogger("crossover-engine");
	}

	evaluate(
		symbol: string,
		snapshot: IndicatorSnapshot,
		currentDirection: PositionDirection
	): Signal {
		if (snapshot.kind !== "crossover" || !this.isComplete(snapshot)) {
			return noSignal(symbol, "insufficient_data", snapshot.timestamp);
		}

		const { timestamp } = snapshot;
		const histTurnedUp = snapshot.macdHist > 0 && snapshot.prevMacdHist <= 0;
		const histTurnedDown = snapshot.macdHist < 0 && snapshot.prevMacdHist >= 0;

		this.logger.debug("crossover_context", {
			symbol,
			direction: currentDirection,
			close: snapshot.close,
			fastEma: snapshot.fastEma,
			slowEma: snapshot.slowEma,
			macdHist: snapshot.macdHist,
			prevMacdHist: snapshot.prevMacdHist,
			rsi: snapshot.rsi,
			momentum: snapshot.momentum,
			histTurnedUp,
			histTurnedDown,
		});

		if (currentDirection === "LONG") {
			const macdExit = snapshot.macd < snapshot.signalLine && histTurnedDown;
			return macdExit || snapshot.fastEma < snapshot.slowEma
				? signalFor(
						symbol,
						"CLOSE_LONG",
						{ reason: "crossover_exit_long" },
						timestamp
					)
				: noSignal(symbol, holdingReason(currentDirection), timestamp);
		}

		if (currentDirection === "SHORT") {
			const macdExit = snapshot.macd > snapshot.signalLine && histTurnedUp;
			return macdExit || snapshot.fastEma > snapshot.slowEma
				? signalFor(
						symbol,
						"CLOSE_SHORT",
						{ reason: "crossover_exit_short" },
						timestamp
					)
				: noSignal(symbol, holdingReason(currentDirection), timestamp);
		}

		if (this.isLongSetup(snapshot, histTurnedUp)) {
			return this.entry(symbol, snapshot, "LONG");
		}
		if (this.isShortSetup(snapshot, histTurnedDown)) {
			return this.entry(symbol, snapshot, "SHORT");
		}
		return noSignal(symbol, "no_signal", timestamp);
	}

	private isLongSetup(snapshot: CrossoverSnapshot, histTurnedUp: boolean): boolean {
		return (
			snapshot.fastEma > snapshot.slowEma &&
			snapshot.macd > snapshot.signalLine &&
			histTurnedUp &&
			snapshot.rsi > RSI_MIDLINE &&
			snapshot.momentum > 0 &&
			snapshot.close > snapshot.bollingerMid
		);
	}

	private isShortSetup(
		snapshot: CrossoverSnapshot,
		histTurnedDown: boolean
	): boolean {
		return (
			snapshot.fastEma < snapshot.slowEma &&
			snapshot.macd < snapshot.signalLine &&
			histTurnedDown &&
			snapshot.rsi < RSI_MIDLINE &&
			snapshot.momentum < 0 &&
			snapshot.close < snapshot.bollingerMid
		);
	}

	private entry(
		symbol: string,
		snapshot: CrossoverSnapshot,
		direction: "LONG" | "SHORT"
	): Signal {
		const sign = direction === "LONG" ? 1 : -1;
		const { close, atr } = snapshot;
		const stopDistance = this.params.atrMultiplier * atr;
		return signalFor(
			symbol,
			direction === "LONG" ? "ENTER_LONG" : "ENTER_SHORT",
			{
				reason: direction === "LONG" ? "crossover_long" : "crossover_short",
				entryPrice: close,
				stopLoss: close - sign * stopDistance,
				profitTarget: close + sign * stopDistance * this.params.profitMultiplier,
				atr,
			},
			snapshot.timestamp
		);
	}

	private isComplete(snapshot: CrossoverSnapshot): boolean {
		return allFinite([
			snapshot.close,
			snapshot.fastEma,
			snapshot.slowEma,
			snapshot.macd,
			snapshot.signalLine,
			snapshot.macdHist,
			snapshot.prevMacdHist,
			snapshot.rsi,
			snapshot.momentum,
			snapshot.atr,
			snapshot.bollingerMid,
		]);
	}
}
