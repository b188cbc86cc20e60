/**
 * Fixed-window arithmetic mean updated in O(1) per sample.
 */
export class RollingMean {
	private readonly window: number[] = [];
	private sum = 0;

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period <= 0) {
			throw new Error(`RollingMean period must be a positive integer, got ${period}`);
		}
	}

	push(value: number): void {
		this.window.push(value);
		this.sum += value;
		if (this.window.length > this.period) {
			this.sum -= this.window.shift() ?? 0;
		}
	}

	get ready(): boolean {
		return this.window.length === this.period;
	}

	get value(): number | null {
		return this.ready ? this.sum / this.period : null;
	}

	reset(): void {
		this.window.length = 0;
		this.sum = 0;
	}
}
