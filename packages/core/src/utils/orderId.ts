export type OrderIdFactory = () => string;

/**
 * Time-stamped, sequence-suffixed ids. Unique within one factory, which is
 * one per session.
 */
export const createOrderIdFactory = (
	prefix = "ord",
	now: () => number = Date.now
): OrderIdFactory => {
	let sequence = 0;
	return () => {
		sequence += 1;
		return `${prefix}-${now()}-${sequence.toString().padStart(6, "0")}`;
	};
};
