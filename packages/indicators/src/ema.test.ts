import { describe, it, expect } from "vitest";
import { EMA_PERIODS } from "@indisync/core";
import { emaSeries } from "./ema";

describe("emaSeries", () => {
	it("should seed with the first value", () => {
		expect(emaSeries([42, 50], 10)[0]).toBe(42);
	});

	it("should keep a constant series exactly constant for every period", () => {
		for (const period of EMA_PERIODS) {
			expect(emaSeries([10, 10, 10], period)).toEqual([10, 10, 10]);
		}
	});

	it("should apply the 2 / (n + 1) smoothing factor", () => {
		expect(emaSeries([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
	});

	it("should follow alpha * close + (1 - alpha) * previous bit for bit", () => {
		const closes = Array.from(
			{ length: 300 },
			(_, i) => 100 + 10 * Math.sin(i / 7) + (i % 5) * 0.37
		);
		for (const period of EMA_PERIODS) {
			const alpha = 2 / (period + 1);
			const series = emaSeries(closes, period);
			let expected = closes[0];
			expect(series[0]).toBe(expected);
			for (let i = 1; i < closes.length; i += 1) {
				expected = alpha * closes[i] + (1 - alpha) * expected;
				expect(series[i]).toBe(expected);
			}
		}
	});

	it("should return an empty series for empty input", () => {
		expect(emaSeries([], 10)).toEqual([]);
	});

	it("should reject non-positive lengths", () => {
		expect(() => emaSeries([1], 0)).toThrow("EMA length must be positive");
	});
});
