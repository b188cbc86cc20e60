export { MaxDailyLossRule, MaxPositionRule } from "./rules";
export { RiskManager } from "./riskManager";
export type { RiskPhase, RiskState } from "./riskManager";
