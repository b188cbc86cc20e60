/**
 * Shared contracts, configuration and logging for every other workspace.
 */
export * from "./types";
export * from "./portfolioState";
export * from "./config";
export * from "./time/time";
export * from "./utils/logger";
export * from "./utils/orderId";
export * from "./utils/cliArgs";
