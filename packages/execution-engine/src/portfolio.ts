import {
	type EquityPoint,
	type MarkPrices,
	type PortfolioState,
	type Position,
	type Side,
	type Trade,
	createLogger,
} from "@barsim/core";

const portfolioLogger = createLogger("execution-engine:portfolio");

/**
 * Long-only cash-and-positions book. Cash may go negative; position quantity
 * never does. A SELL beyond the held quantity floors the position at zero and
 * still credits the full proceeds.
 */
export class Portfolio {
	private cashBalance: number;
	private readonly positions = new Map<string, Position>();
	private readonly curve: EquityPoint[] = [];

	constructor(readonly initialCash: number) {
		this.cashBalance = initialCash;
	}

	get cash(): number {
		return this.cashBalance;
	}

	get equityCurve(): readonly EquityPoint[] {
		return this.curve;
	}

	getPosition(symbol: string): Position | undefined {
		const position = this.positions.get(symbol);
		return position ? { ...position } : undefined;
	}

	heldQuantity(symbol: string): number {
		return this.positions.get(symbol)?.quantity ?? 0;
	}

	updatePosition(symbol: string, side: Side, quantity: number, price: number): void {
		const position = this.ensurePosition(symbol);
		const notional = quantity * price;

		if (side === "BUY") {
			const nextQuantity = position.quantity + quantity;
			if (nextQuantity > 0) {
				position.avgPrice =
					(position.avgPrice * position.quantity + notional) / nextQuantity;
			}
			position.quantity = nextQuantity;
			this.cashBalance -= notional;
		} else {
			if (quantity > position.quantity) {
				portfolioLogger.debug("oversell_clamped", {
					symbol,
					held: position.quantity,
					requested: quantity,
				});
			}
			position.quantity = Math.max(0, position.quantity - quantity);
			this.cashBalance += notional;
		}
	}

	applyTrade(trade: Trade): void {
		this.updatePosition(trade.symbol, trade.side, trade.quantity, trade.price);
		this.cashBalance -= trade.fee;
		portfolioLogger.debug("trade_applied", {
			orderId: trade.orderId,
			cash: this.cashBalance,
		});
	}

	markToMarket(marks: MarkPrices): number {
		let value = this.cashBalance;
		for (const [symbol, position] of this.positions) {
			value += position.quantity * (marks[symbol] ?? position.avgPrice);
		}
		return value;
	}

	recordEquity(timestamp: number, equity: number): void {
		const last = this.curve[this.curve.length - 1];
		if (last && timestamp <= last.timestamp) {
			throw new Error(
				`Equity timestamp ${timestamp} must be after the last recorded ${last.timestamp}`
			);
		}
		this.curve.push({ timestamp, equity });
	}

	snapshot(): PortfolioState {
		const positions: Record<string, Position> = {};
		for (const [symbol, position] of this.positions) {
			positions[symbol] = { ...position };
		}
		return {
			cash: this.cashBalance,
			positions,
			equityCurve: this.curve.map((point) => ({ ...point })),
		};
	}

	private ensurePosition(symbol: string): Position {
		const existing = this.positions.get(symbol);
		if (existing) {
			return existing;
		}
		const created: Position = { symbol, quantity: 0, avgPrice: 0 };
		this.positions.set(symbol, created);
		return created;
	}
}
