import { describe, expect, it } from "vitest";
import type { Bar } from "@barsim/core";
import { BarQueue } from "./barQueue";
import { bar } from "../__tests__/fixtures";

interface Deferred {
	promise: Promise<void>;
	resolve: () => void;
}

const deferred = (): Deferred => {
	let resolve: () => void = () => undefined;
	const promise = new Promise<void>((done) => {
		resolve = done;
	});
	return { promise, resolve };
};

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("BarQueue", () => {
	it("handles bars one at a time in arrival order", async () => {
		const handled: number[] = [];
		let active = 0;
		let maxActive = 0;
		const queue = new BarQueue(async (item: Bar) => {
			active += 1;
			maxActive = Math.max(maxActive, active);
			await tick();
			handled.push(item.timestamp / 60_000);
			active -= 1;
		});

		await Promise.all([1, 2, 3, 4, 5].map((minute) => queue.push(bar(minute, 100))));
		await queue.idle();

		expect(handled).toEqual([1, 2, 3, 4, 5]);
		expect(maxActive).toBe(1);
	});

	it("holds producers back while full", async () => {
		const gate = deferred();
		const handled: number[] = [];
		const queue = new BarQueue(async (item: Bar) => {
			if (item.timestamp === 60_000) {
				await gate.promise;
			}
			handled.push(item.timestamp / 60_000);
		}, 1);

		await queue.push(bar(1, 100));
		await queue.push(bar(2, 100));
		let thirdAdmitted = false;
		const third = queue.push(bar(3, 100)).then((admitted) => {
			thirdAdmitted = admitted;
		});

		await tick();
		expect(thirdAdmitted).toBe(false);
		expect(queue.size).toBe(1);

		gate.resolve();
		await third;
		await queue.idle();
		expect(thirdAdmitted).toBe(true);
		expect(handled).toEqual([1, 2, 3]);
	});

	it("finishes the bar in flight and discards the rest on close", async () => {
		const gate = deferred();
		const handled: number[] = [];
		const queue = new BarQueue(async (item: Bar) => {
			await gate.promise;
			handled.push(item.timestamp / 60_000);
		}, 2);

		await queue.push(bar(1, 100));
		await queue.push(bar(2, 100));
		await queue.push(bar(3, 100));
		const blocked = queue.push(bar(4, 100));

		const closing = queue.close();
		expect(await blocked).toBe(false);
		gate.resolve();

		expect(await closing).toBe(2);
		expect(handled).toEqual([1]);
		expect(await queue.push(bar(5, 100))).toBe(false);
	});

	it("keeps draining after a worker error", async () => {
		const handled: number[] = [];
		const queue = new BarQueue((item: Bar) => {
			if (item.timestamp === 60_000) {
				throw new Error("boom");
			}
			handled.push(item.timestamp / 60_000);
		});
		await queue.push(bar(1, 100));
		await queue.push(bar(2, 100));
		await queue.idle();
		expect(handled).toEqual([2]);
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new BarQueue(() => undefined, 0)).toThrowError(
			"BarQueue capacity must be a positive integer, got 0"
		);
	});
});
