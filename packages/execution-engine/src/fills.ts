import type { Side, Trade } from "@barsim/core";

export interface FillModel {
	/** Fractional slippage, applied multiplicatively against the taker. */
	slippagePct: number;
	/** Absolute price slippage, added after the fractional component. */
	slippageAbs: number;
	feeRate: number;
}

export interface FillRequest {
	orderId: string;
	symbol: string;
	side: Side;
	quantity: number;
	price: number;
	timestamp: number;
}

export const ZERO_COST_FILL: FillModel = {
	slippagePct: 0,
	slippageAbs: 0,
	feeRate: 0,
};

export const slippedPrice = (side: Side, price: number, model: FillModel): number =>
	side === "BUY"
		? price * (1 + model.slippagePct) + model.slippageAbs
		: price * (1 - model.slippagePct) - model.slippageAbs;

export const tradeFee = (quantity: number, price: number, feeRate: number): number =>
	Math.abs(quantity) * price * feeRate;

export const simulateFill = (
	request: FillRequest,
	model: FillModel = ZERO_COST_FILL
): Trade => {
	const price = slippedPrice(request.side, request.price, model);
	return Object.freeze({
		orderId: request.orderId,
		symbol: request.symbol,
		side: request.side,
		quantity: request.quantity,
		price,
		fee: tradeFee(request.quantity, price, model.feeRate),
		timestamp: request.timestamp,
	});
};
