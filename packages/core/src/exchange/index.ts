export type { MarketDataSource } from "./MarketDataSource";
export type {
	AccountSnapshot,
	BracketFill,
	ExecutionContext,
	ExecutionOutcome,
	ExecutionRejection,
	ExecutionSuccess,
	OrderExecutionGateway,
	OrderRequest,
} from "./OrderExecutionGateway";
