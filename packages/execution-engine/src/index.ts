export { PaperAccount } from "./paperAccount";
export type {
	ClosedTrade,
	PaperAccountSnapshot,
	TradeTally,
} from "./paperAccount";
export { PaperExecutionGateway } from "./paperGateway";
export type { PaperExecutionGatewayOptions, PaperPosition } from "./paperGateway";
export { LiveExecutionGateway } from "./liveGateway";
export type {
	LiveExecutionGatewayOptions,
	OrderClient,
	SubmittedOrder,
} from "./liveGateway";
