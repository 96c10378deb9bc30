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
	createLogger,
	pipSize,
	protectiveExitFor,
	toPlainSymbol,
} from "@fxdesk/core";

import { ClosedTrade, PaperAccount } from "./paperAccount";

const DEFAULT_PIP_VALUE = 10;

export interface PaperPosition {
	orderId: string;
	direction: ActiveDirection;
	size: number;
	entryPrice: number;
	stopLoss: number;
	takeProfit?: number;
	openedAt: number;
}

export interface PaperExecutionGatewayOptions {
	account: PaperAccount;
	/** Account-currency value of one pip for one lot. */
	pipValue?: (symbol: string) => number;
	logger?: ModuleLogger;
	now?: () => number;
}

/**
 * Fills every order immediately at the requested price and books the result
 * against a paper account when the position is closed. Stop and target rest
 * with the gateway and fill in `settleBrackets`.
 */
export class PaperExecutionGateway implements OrderExecutionGateway {
	readonly supportsBracketOrders = true;

	private readonly positions = new Map<string, PaperPosition>();
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private sequence = 0;

	constructor(private readonly options: PaperExecutionGatewayOptions) {
		this.logger = options.logger ?? createLogger("execution-engine:paper");
		this.now = options.now ?? Date.now;
	}

	async placeOrder(request: OrderRequest): Promise<ExecutionOutcome> {
		const symbol = toPlainSymbol(request.symbol);
		if (this.positions.has(symbol)) {
			return { success: false, reason: "position_not_flat" };
		}
		if (
			!(request.size > 0) ||
			!Number.isFinite(request.price) ||
			!Number.isFinite(request.stopLoss)
		) {
			return { success: false, reason: "invalid_order" };
		}

		this.sequence += 1;
		const position: PaperPosition = {
			orderId: `paper-${this.sequence}`,
			direction: request.side === "buy" ? "LONG" : "SHORT",
			size: request.size,
			entryPrice: request.price,
			stopLoss: request.stopLoss,
			takeProfit: request.takeProfit,
			openedAt: this.now(),
		};
		this.positions.set(symbol, position);
		this.logger.info("paper_order_filled", { symbol, ...position });

		return { success: true, orderId: position.orderId, price: request.price };
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
		const exitPrice = context.price;
		if (exitPrice === undefined || !Number.isFinite(exitPrice)) {
			return { success: false, reason: "missing_price" };
		}

		const realizedPnl = this.settle(key, position, exitPrice);
		return {
			success: true,
			orderId: position.orderId,
			price: exitPrice,
			realizedPnl,
		};
	}

	async settleBrackets(symbol: string, bar: Bar): Promise<BracketFill | null> {
		const key = toPlainSymbol(symbol);
		const position = this.positions.get(key);
		if (!position) {
			return null;
		}
		const exit = protectiveExitFor(position, bar);
		if (!exit) {
			return null;
		}

		this.logger.info("paper_bracket_filled", {
			symbol: key,
			trigger: exit.reason,
			price: exit.price,
		});
		const realizedPnl = this.settle(key, position, exit.price);
		return {
			success: true,
			orderId: position.orderId,
			price: exit.price,
			realizedPnl,
			trigger: exit.reason,
		};
	}

	async getAccountSnapshot(): Promise<AccountSnapshot> {
		const { balance, equity, currency } = this.options.account.snapshot();
		return { balance, equity, currency };
	}

	getPosition(symbol: string): PaperPosition | null {
		const position = this.positions.get(toPlainSymbol(symbol));
		return position ? { ...position } : null;
	}

	private settle(symbol: string, position: PaperPosition, exitPrice: number): number {
		const priceMove =
			position.direction === "LONG"
				? exitPrice - position.entryPrice
				: position.entryPrice - exitPrice;
		const pips = priceMove / pipSize(symbol);
		const pipValue = this.options.pipValue?.(symbol) ?? DEFAULT_PIP_VALUE;
		const realizedPnl = pips * pipValue * position.size;

		const trade: ClosedTrade = {
			symbol,
			direction: position.direction,
			size: position.size,
			entryPrice: position.entryPrice,
			exitPrice,
			pips,
			realizedPnl,
			closedAt: this.now(),
		};
		const snapshot = this.options.account.registerClosedTrade(trade);
		this.positions.delete(symbol);
		this.logger.info("paper_account_snapshot", { symbol, snapshot });
		return realizedPnl;
	}
}
