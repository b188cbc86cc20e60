import {
	type ExecutionResult,
	type Order,
	type Trade,
	createLogger,
} from "@barsim/core";
import { tradeFee } from "./fills";

const paperLogger = createLogger("execution-engine:paper");

export interface PaperBrokerOptions {
	feeRate?: number;
	/** Reported on each fill; no delay is simulated. */
	latencyMs?: number;
}

export const DEFAULT_PAPER_FEE_RATE = 0.0005;

/** Always-filled broker: every order fills in full at the supplied mark. */
export class PaperBroker {
	readonly feeRate: number;
	readonly latencyMs: number;
	private readonly ledger: Trade[] = [];

	constructor(options: PaperBrokerOptions = {}) {
		this.feeRate = options.feeRate ?? DEFAULT_PAPER_FEE_RATE;
		this.latencyMs = options.latencyMs ?? 0;
	}

	get trades(): readonly Trade[] {
		return this.ledger;
	}

	execute(order: Order, markPrice: number): ExecutionResult {
		const trade: Trade = Object.freeze({
			orderId: order.id,
			symbol: order.symbol,
			side: order.side,
			quantity: order.quantity,
			price: markPrice,
			fee: tradeFee(order.quantity, markPrice, this.feeRate),
			timestamp: order.timestamp,
		});
		this.ledger.push(trade);

		paperLogger.debug("paper_fill", {
			orderId: order.id,
			type: order.type,
			advisoryPrice: order.price,
			price: markPrice,
			fee: trade.fee,
		});

		return {
			success: true,
			trade,
			message: `Filled ${order.side} ${order.quantity} ${order.symbol} @ ${markPrice} (latency ${this.latencyMs}ms)`,
		};
	}
}
