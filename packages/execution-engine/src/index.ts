export { Portfolio } from "./portfolio";
export { PaperBroker, DEFAULT_PAPER_FEE_RATE } from "./paperBroker";
export type { PaperBrokerOptions } from "./paperBroker";
export { simulateFill, slippedPrice, tradeFee, ZERO_COST_FILL } from "./fills";
export type { FillModel, FillRequest } from "./fills";
