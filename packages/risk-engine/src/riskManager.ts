import {
	type PortfolioState,
	type RiskConfig,
	type Signal,
	createLogger,
	totalValue,
} from "@barsim/core";
import { MaxDailyLossRule, MaxPositionRule } from "./rules";

const riskLogger = createLogger("risk-engine");

export type RiskState = "NORMAL" | "HALTED";
export type RiskPhase = "pre_sizing" | "post_sizing";

export class RiskManager {
	readonly dailyLoss: MaxDailyLossRule;
	readonly maxPosition: MaxPositionRule;
	private currentState: RiskState = "NORMAL";

	constructor(config: RiskConfig) {
		this.dailyLoss = new MaxDailyLossRule(config.maxDailyLossPct);
		this.maxPosition = new MaxPositionRule(config.maxPositionPct);
	}

	get state(): RiskState {
		return this.currentState;
	}

	get isHalted(): boolean {
		return this.currentState === "HALTED";
	}

	/**
	 * Gates a signal against the daily-loss limit, then caps its size. Once the
	 * limit is breached the manager stays HALTED for the rest of its life.
	 */
	approve(
		signal: Signal,
		portfolio: Readonly<PortfolioState>,
		price: number,
		symbol: string,
		phase: RiskPhase = "pre_sizing"
	): Signal | null {
		const equity = totalValue(portfolio, { [symbol]: price });
		if (!this.dailyLoss.validate(portfolio, equity)) {
			if (!this.isHalted) {
				this.currentState = "HALTED";
				riskLogger.error("risk_halted", {
					symbol,
					phase,
					equity,
					startEquity: portfolio.equityCurve[0]?.equity,
					maxDailyLossPct: this.dailyLoss.maxLossPct,
					timestamp: signal.timestamp,
				});
			}
			return null;
		}

		if (this.isHalted) {
			return null;
		}

		const adjusted = this.maxPosition.adjust(portfolio, symbol, signal, price);
		if (!adjusted) {
			riskLogger.warn("risk_signal_rejected", {
				symbol,
				phase,
				side: signal.side,
				size: signal.size,
				price,
				equity,
			});
			return null;
		}

		if (adjusted !== signal) {
			riskLogger.info("risk_signal_adjusted", {
				symbol,
				phase,
				side: signal.side,
				requested: signal.size,
				approved: adjusted.size,
			});
		}
		return adjusted;
	}
}
