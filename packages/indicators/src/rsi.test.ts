import { describe, it, expect } from "vitest";
import { rsiSeries } from "./rsi";

const range = (from: number, to: number): number[] => {
	const step = from <= to ? 1 : -1;
	const values: number[] = [];
	for (let value = from; value !== to + step; value += step) {
		values.push(value);
	}
	return values;
};

describe("rsiSeries", () => {
	it("should leave the first period rows undefined", () => {
		const rsi = rsiSeries(range(1, 20), 14);
		expect(rsi.slice(0, 14).every((value) => value === null)).toBe(true);
		expect(rsi[14]).not.toBeNull();
	});

	it("should return 100 when there are gains and no losses", () => {
		const rsi = rsiSeries(range(1, 20), 14);
		expect(rsi.slice(14)).toEqual([100, 100, 100, 100, 100, 100]);
	});

	it("should return 0 when there are losses and no gains", () => {
		const rsi = rsiSeries(range(20, 1), 14);
		expect(rsi.slice(14)).toEqual([0, 0, 0, 0, 0, 0]);
	});

	it("should be undefined on a flat series", () => {
		const rsi = rsiSeries(new Array<number>(20).fill(50), 14);
		expect(rsi.every((value) => value === null)).toBe(true);
	});

	it("should use plain rolling means of gains and losses", () => {
		// gains [-, 2, 0, 2], losses [-, 0, 1, 0]
		const rsi = rsiSeries([1, 3, 2, 4], 2);
		expect(rsi[0]).toBeNull();
		expect(rsi[1]).toBeNull();
		expect(rsi[2]).toBeCloseTo(200 / 3, 10);
		expect(rsi[3]).toBeCloseTo(200 / 3, 10);
	});
});
