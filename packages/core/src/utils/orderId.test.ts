import { describe, expect, it } from "vitest";
import { createOrderIdFactory } from "./orderId";

describe("createOrderIdFactory", () => {
	it("issues sequential ids stamped with the clock", () => {
		const nextId = createOrderIdFactory("ord", () => 1700000000000);
		expect(nextId()).toBe("ord-1700000000000-000001");
		expect(nextId()).toBe("ord-1700000000000-000002");
	});

	it("never repeats within one factory", () => {
		const nextId = createOrderIdFactory();
		const ids = new Set(Array.from({ length: 50 }, () => nextId()));
		expect(ids.size).toBe(50);
	});
});
