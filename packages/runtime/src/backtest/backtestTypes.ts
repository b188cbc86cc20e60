import type {
	EquityPoint,
	OversellPolicy,
	PortfolioState,
	RiskConfig,
	SizingBasis,
	Trade,
} from "@barsim/core";
import type { RiskManager, RiskState } from "@barsim/risk-engine";

export interface BacktestConfig {
	symbol: string;
	initialCash: number;
	sizingFraction: number;
	risk: RiskConfig;
	sizingBasis?: SizingBasis;
	slippagePct?: number;
	slippageAbs?: number;
	feeRate?: number;
	oversellPolicy?: OversellPolicy;
}

export type BacktestResolvedConfig = Required<BacktestConfig>;

export interface RunBacktestOptions {
	/** Injected risk manager; its state carries over into this run. */
	riskManager?: RiskManager;
	orderIdPrefix?: string;
}

export interface BacktestResult {
	config: BacktestResolvedConfig;
	portfolio: PortfolioState;
	trades: Trade[];
	equityCurve: EquityPoint[];
	riskState: RiskState;
	barsProcessed: number;
}
