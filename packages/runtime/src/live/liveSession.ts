import type { LiveSessionState, Trade } from "@barsim/core";
import { Portfolio } from "@barsim/execution-engine";

/** Mutable state owned by one live paper session. */
export class LiveSession {
	readonly portfolio: Portfolio;
	private readonly ledger: Trade[] = [];
	private lastTimestamp: number | null = null;

	constructor(
		initialCash: number,
		readonly startTime: number = Date.now()
	) {
		this.portfolio = new Portfolio(initialCash);
	}

	get trades(): readonly Trade[] {
		return this.ledger;
	}

	get lastBarTimestamp(): number | null {
		return this.lastTimestamp;
	}

	/** False when `timestamp` does not advance past the last accepted bar. */
	accept(timestamp: number): boolean {
		if (this.lastTimestamp !== null && timestamp <= this.lastTimestamp) {
			return false;
		}
		this.lastTimestamp = timestamp;
		return true;
	}

	recordTrade(trade: Trade): void {
		this.ledger.push(trade);
	}

	toState(): LiveSessionState {
		return {
			startTime: this.startTime,
			portfolio: this.portfolio.snapshot(),
			trades: [...this.ledger],
		};
	}
}
