export * from "./time/time";

export interface Bar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type ActiveDirection = "LONG" | "SHORT";
export type PositionDirection = ActiveDirection | "FLAT";

export type SignalKind =
	| "NONE"
	| "ENTER_LONG"
	| "ENTER_SHORT"
	| "CLOSE_LONG"
	| "CLOSE_SHORT";

export type OrderSide = "buy" | "sell";

export interface SignalMeta {
	reason: string;
	entryPrice?: number;
	stopLoss?: number;
	profitTarget?: number;
	atr?: number;
}

export interface Signal {
	readonly symbol: string;
	readonly kind: SignalKind;
	readonly meta: Readonly<SignalMeta>;
	readonly timestamp: number;
}

export interface PositionState {
	direction: PositionDirection;
	entryPrice: number;
	stopLoss: number;
	takeProfit?: number;
	size: number;
	entryTime: number;
	orderId?: string;
}

export const FLAT_POSITION: Readonly<PositionState> = Object.freeze({
	direction: "FLAT",
	entryPrice: 0,
	stopLoss: 0,
	size: 0,
	entryTime: 0,
});

export const createSignal = (
	symbol: string,
	kind: SignalKind,
	meta: SignalMeta,
	timestamp: number
): Signal =>
	Object.freeze({
		symbol,
		kind,
		meta: Object.freeze({ ...meta }),
		timestamp,
	});

export const isEntrySignal = (kind: SignalKind): boolean =>
	kind === "ENTER_LONG" || kind === "ENTER_SHORT";

export const isExitSignal = (kind: SignalKind): boolean =>
	kind === "CLOSE_LONG" || kind === "CLOSE_SHORT";

export const directionForEntry = (kind: SignalKind): ActiveDirection | null => {
	switch (kind) {
		case "ENTER_LONG":
			return "LONG";
		case "ENTER_SHORT":
			return "SHORT";
		default:
			return null;
	}
};

export const orderSideFor = (direction: ActiveDirection): OrderSide =>
	direction === "LONG" ? "buy" : "sell";

export type ProtectiveExitReason = "stop_loss" | "take_profit";

export interface ProtectiveExit {
	reason: ProtectiveExitReason;
	price: number;
}

export interface ProtectiveLevels {
	direction: ActiveDirection;
	stopLoss: number;
	takeProfit?: number;
}

/**
 * Checks a bar's range against a position's stop and target. The stop wins
 * when one bar spans both. Fills at the level, or at the open when the bar
 * gapped through it.
 */
export const protectiveExitFor = (
	levels: ProtectiveLevels,
	bar: Bar
): ProtectiveExit | null => {
	const { stopLoss, takeProfit } = levels;
	if (levels.direction === "LONG") {
		if (bar.low <= stopLoss) {
			return { reason: "stop_loss", price: Math.min(bar.open, stopLoss) };
		}
		if (takeProfit !== undefined && bar.high >= takeProfit) {
			return { reason: "take_profit", price: Math.max(bar.open, takeProfit) };
		}
		return null;
	}
	if (bar.high >= stopLoss) {
		return { reason: "stop_loss", price: Math.max(bar.open, stopLoss) };
	}
	if (takeProfit !== undefined && bar.low <= takeProfit) {
		return { reason: "take_profit", price: Math.min(bar.open, takeProfit) };
	}
	return null;
};
