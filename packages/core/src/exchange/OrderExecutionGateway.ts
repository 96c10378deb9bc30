import type { Bar, OrderSide, ProtectiveExitReason } from "../types";

export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	size: number;
	price: number;
	stopLoss: number;
	takeProfit?: number;
}

export interface ExecutionContext {
	price?: number;
}

export interface ExecutionSuccess {
	success: true;
	orderId: string;
	price?: number;
	realizedPnl?: number;
}

export interface ExecutionRejection {
	success: false;
	reason: string;
}

export type ExecutionOutcome = ExecutionSuccess | ExecutionRejection;

/** A position the gateway closed on its own when a bracket level traded. */
export interface BracketFill extends ExecutionSuccess {
	trigger: ProtectiveExitReason;
	price: number;
}

export interface AccountSnapshot {
	balance: number;
	equity: number;
	currency: string;
}

/**
 * Write side of the broker boundary. A `success: false` outcome is a normal
 * rejection; callers must not mutate position state unless `success` is true.
 */
export interface OrderExecutionGateway {
	/**
	 * Whether stop and target are held by the gateway. When false the caller
	 * watches the levels itself and closes through `closePosition`.
	 */
	readonly supportsBracketOrders: boolean;
	placeOrder(request: OrderRequest): Promise<ExecutionOutcome>;
	closePosition(
		symbol: string,
		context?: ExecutionContext
	): Promise<ExecutionOutcome>;
	/**
	 * Lets a bracket-holding gateway fill the stop or target the bar traded
	 * through. Gateways without brackets resolve `null`.
	 */
	settleBrackets(symbol: string, bar: Bar): Promise<BracketFill | null>;
	getAccountSnapshot(): Promise<AccountSnapshot>;
}
