import { describe, expect, it } from "vitest";
import { LiveExecutionGateway, OrderClient, SubmittedOrder } from "./index";

interface OrderCall {
	symbol: string;
	type: string;
	side: string;
	amount: number;
}

class FakeOrderClient implements OrderClient {
	readonly calls: OrderCall[] = [];
	failNext = false;

	async createOrder(
		symbol: string,
		type: string,
		side: string,
		amount: number
	): Promise<SubmittedOrder> {
		if (this.failNext) {
			this.failNext = false;
			throw new Error("insufficient margin");
		}
		this.calls.push({ symbol, type, side, amount });
		return { id: `order-${this.calls.length}`, average: 1.2001 };
	}

	async fetchBalance(): Promise<Record<string, unknown>> {
		return { USD: { free: 9_500, used: 500, total: 10_000 } };
	}
}

describe("LiveExecutionGateway", () => {
	it("submits market orders with the exchange symbol", async () => {
		const client = new FakeOrderClient();
		const gateway = new LiveExecutionGateway({ client });
		const outcome = await gateway.placeOrder({
			symbol: "EURUSD",
			side: "buy",
			size: 0.3,
			price: 1.2,
			stopLoss: 1.19,
		});
		expect(outcome).toEqual({ success: true, orderId: "order-1", price: 1.2001 });
		expect(client.calls).toEqual([
			{ symbol: "EUR/USD", type: "market", side: "buy", amount: 0.3 },
		]);
	});

	it("closes with an opposite order of the same size", async () => {
		const client = new FakeOrderClient();
		const gateway = new LiveExecutionGateway({ client });
		await gateway.placeOrder({
			symbol: "GBPUSD",
			side: "sell",
			size: 0.2,
			price: 1.3,
			stopLoss: 1.31,
		});
		const outcome = await gateway.closePosition("GBPUSD", { price: 1.29 });
		expect(outcome.success).toBe(true);
		expect(client.calls[1]).toEqual({
			symbol: "GBP/USD",
			type: "market",
			side: "buy",
			amount: 0.2,
		});
	});

	it("turns exchange errors into rejections", async () => {
		const client = new FakeOrderClient();
		client.failNext = true;
		const gateway = new LiveExecutionGateway({ client });
		const outcome = await gateway.placeOrder({
			symbol: "EURUSD",
			side: "buy",
			size: 0.3,
			price: 1.2,
			stopLoss: 1.19,
		});
		expect(outcome).toEqual({ success: false, reason: "insufficient margin" });
		expect(await gateway.closePosition("EURUSD")).toEqual({
			success: false,
			reason: "no_position",
		});
	});

	it("holds no brackets for the caller to settle", async () => {
		const client = new FakeOrderClient();
		const gateway = new LiveExecutionGateway({ client });
		await gateway.placeOrder({
			symbol: "EURUSD",
			side: "buy",
			size: 0.3,
			price: 1.2,
			stopLoss: 1.19,
		});

		expect(gateway.supportsBracketOrders).toBe(false);
		expect(
			await gateway.settleBrackets("EURUSD", {
				timestamp: Date.UTC(2024, 0, 1),
				open: 1.1,
				high: 1.1,
				low: 1.1,
				close: 1.1,
				volume: 1,
			})
		).toBeNull();
		expect(client.calls).toHaveLength(1);
	});

	it("reads free and total balance for the account currency", async () => {
		const gateway = new LiveExecutionGateway({ client: new FakeOrderClient() });
		expect(await gateway.getAccountSnapshot()).toEqual({
			balance: 9_500,
			equity: 10_000,
			currency: "USD",
		});
	});
});
