import {
	PositionDirection,
	SessionConfig,
	Signal,
	utcHour,
	validateSessionConfig,
} from "@fxdesk/core";
import type { IndicatorSnapshot } from "@fxdesk/indicators";

import { SignalEngine, noSignal, signalFor } from "./SignalEngine";

/**
 * Restricts another engine to a UTC trading window taken from the bar time.
 * Open positions are closed from `end - closeLeadHours` on, whatever the
 * inner engine would say.
 */
export class SessionGatedSignalEngine implements SignalEngine {
	constructor(
		private readonly inner: SignalEngine,
		private readonly session: SessionConfig
	) {
		validateSessionConfig(session);
	}

	evaluate(
		symbol: string,
		snapshot: IndicatorSnapshot,
		currentDirection: PositionDirection
	): Signal {
		if (snapshot.kind === "insufficient" && snapshot.available === 0) {
			return this.inner.evaluate(symbol, snapshot, currentDirection);
		}

		const hour = utcHour(snapshot.timestamp);
		const { start, end, closeLeadHours } = this.session;

		if (currentDirection !== "FLAT" && hour >= end - closeLeadHours) {
			return signalFor(
				symbol,
				currentDirection === "LONG" ? "CLOSE_LONG" : "CLOSE_SHORT",
				{ reason: "session_end" },
				snapshot.timestamp
			);
		}

		if (hour < start || hour >= end) {
			return noSignal(symbol, "outside_session", snapshot.timestamp);
		}

		return this.inner.evaluate(symbol, snapshot, currentDirection);
	}
}
