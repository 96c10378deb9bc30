import {
	AccountSnapshot,
	ActiveDirection,
	Bar,
	BracketFill,
	ExecutionContext,
	ExecutionOutcome,
	ModuleLogger,
	OrderExecutionGateway,
	OrderRequest,
	OrderSide,
	createLogger,
	describeError,
	toMarketSymbol,
	toPlainSymbol,
} from "@fxdesk/core";

export interface SubmittedOrder {
	id: string;
	average?: number;
	price?: number;
}

/**
 * The part of a ccxt exchange the live gateway talks to. A ccxt `Exchange`
 * instance satisfies it.
 */
export interface OrderClient {
	createOrder(
		symbol: string,
		type: string,
		side: string,
		amount: number
	): Promise<SubmittedOrder>;
	fetchBalance(): Promise<Record<string, unknown>>;
}

export interface LiveExecutionGatewayOptions {
	client: OrderClient;
	currency?: string;
	logger?: ModuleLogger;
}

interface LivePosition {
	orderId: string;
	direction: ActiveDirection;
	size: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null;

const readAmount = (value: unknown): number | null =>
	typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Sends market orders through an exchange client. Stops and targets stay with
 * the caller, which closes the position when a bar trades through them.
 */
export class LiveExecutionGateway implements OrderExecutionGateway {
	readonly supportsBracketOrders = false;

	private readonly positions = new Map<string, LivePosition>();
	private readonly logger: ModuleLogger;
	private readonly currency: string;

	constructor(private readonly options: LiveExecutionGatewayOptions) {
		this.logger = options.logger ?? createLogger("execution-engine:live");
		this.currency = options.currency ?? "USD";
	}

	async placeOrder(request: OrderRequest): Promise<ExecutionOutcome> {
		const key = toPlainSymbol(request.symbol);
		if (this.positions.has(key)) {
			return { success: false, reason: "position_not_flat" };
		}

		const outcome = await this.submit(key, request.side, request.size);
		if (outcome.success) {
			this.positions.set(key, {
				orderId: outcome.orderId,
				direction: request.side === "buy" ? "LONG" : "SHORT",
				size: request.size,
			});
		}
		return outcome;
	}

	async closePosition(
		symbol: string,
		context: ExecutionContext = {}
	): Promise<ExecutionOutcome> {
		const key = toPlainSymbol(symbol);
		const position = this.positions.get(key);
		if (!position) {
			return { success: false, reason: "no_position" };
		}

		const side: OrderSide = position.direction === "LONG" ? "sell" : "buy";
		const outcome = await this.submit(key, side, position.size, context.price);
		if (outcome.success) {
			this.positions.delete(key);
		}
		return outcome;
	}

	async settleBrackets(_symbol: string, _bar: Bar): Promise<BracketFill | null> {
		return null;
	}

	async getAccountSnapshot(): Promise<AccountSnapshot> {
		const balances = await this.options.client.fetchBalance();
		const entry = balances[this.currency];
		const total = isRecord(entry) ? readAmount(entry.total) : null;
		const free = isRecord(entry) ? readAmount(entry.free) : null;
		const balance = free ?? total ?? 0;
		return { balance, equity: total ?? balance, currency: this.currency };
	}

	private async submit(
		symbol: string,
		side: OrderSide,
		size: number,
		fallbackPrice?: number
	): Promise<ExecutionOutcome> {
		const marketSymbol = toMarketSymbol(symbol);
		try {
			const order = await this.options.client.createOrder(
				marketSymbol,
				"market",
				side,
				size
			);
			this.logger.info("live_order_submitted", {
				symbol: marketSymbol,
				side,
				size,
				orderId: order.id,
			});
			return {
				success: true,
				orderId: order.id,
				price: order.average ?? order.price ?? fallbackPrice,
			};
		} catch (error) {
			const reason = describeError(error);
			this.logger.error("live_order_failed", {
				symbol: marketSymbol,
				side,
				size,
				reason,
			});
			return { success: false, reason };
		}
	}
}
