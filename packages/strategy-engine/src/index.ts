export type { Strategy } from "./types";
export { fixedFractional } from "./positionSizing";
export type { SizingOptions } from "./positionSizing";
export { RollingMean } from "./indicators/rollingMean";
export { SmaCrossStrategy } from "./sma-cross/SmaCrossStrategy";
export type { SmaCrossConfig } from "./sma-cross/SmaCrossStrategy";
export { createStrategy, listStrategyIds } from "./registry";
