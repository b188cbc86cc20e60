export interface Bar {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type Side = "BUY" | "SELL";
export type OrderType = "MARKET" | "LIMIT";

/**
 * Directional trade intent. `size` is a magnitude; `side` carries direction.
 * Sizing and risk stages never mutate a signal, they hand back a copy.
 */
export interface Signal {
	readonly timestamp: number;
	readonly side: Side;
	readonly confidence: number;
	readonly size: number;
}

export interface Order {
	id: string;
	symbol: string;
	side: Side;
	quantity: number;
	type: OrderType;
	/** Advisory only for MARKET orders. */
	price?: number;
	timestamp: number;
}

export interface Trade {
	readonly orderId: string;
	readonly symbol: string;
	readonly side: Side;
	readonly quantity: number;
	readonly price: number;
	readonly fee: number;
	readonly timestamp: number;
}

export interface ExecutionResult {
	success: boolean;
	trade?: Trade;
	message: string;
}

export interface Position {
	symbol: string;
	quantity: number;
	avgPrice: number;
}

export interface EquityPoint {
	timestamp: number;
	equity: number;
}

export interface PortfolioState {
	cash: number;
	positions: Record<string, Position>;
	equityCurve: EquityPoint[];
}

export type MarkPrices = Record<string, number>;

export interface LiveSessionState {
	startTime: number;
	portfolio: PortfolioState;
	trades: Trade[];
}
