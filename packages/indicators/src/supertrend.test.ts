import { describe, it, expect } from "vitest";
import { supertrendSeries } from "./supertrend";

const barsFromCloses = (closes: number[]) =>
	closes.map((close) => ({ high: close + 0.5, low: close - 0.5, close }));

// 100 down to 86 in unit steps, so true range is 1.5 and ATR(10) is 1.5
const steadyDecline = Array.from({ length: 15 }, (_, i) => 100 - i);

const transitions = (trends: string[]): number[] =>
	trends.flatMap((trend, i) => (i > 0 && trend !== trends[i - 1] ? [i] : []));

describe("supertrendSeries", () => {
	it("should start in an uptrend with an undefined value", () => {
		const points = supertrendSeries(barsFromCloses(steadyDecline));
		expect(points[0]).toEqual({ value: null, trend: "uptrend" });
	});

	it("should carry undefined bands until the previous row has an ATR", () => {
		const points = supertrendSeries(barsFromCloses(steadyDecline));
		expect(points.slice(0, 11).every((point) => point.value === null)).toBe(
			true
		);
		expect(points[11].value).toBe(85.5);
		expect(points[14].value).toBe(82.5);
	});

	it("should stay in an uptrend when the close never reaches the lower band", () => {
		const points = supertrendSeries(barsFromCloses(steadyDecline));
		expect(points.every((point) => point.trend === "uptrend")).toBe(true);
	});

	it("should flip exactly once on a sharp drop", () => {
		const closes = [...steadyDecline, 66, 65, 64, 63, 62];
		const points = supertrendSeries(barsFromCloses(closes));
		const trends = points.map((point) => point.trend);

		expect(transitions(trends)).toEqual([15]);
		expect(trends[14]).toBe("uptrend");
		expect(trends.slice(15).every((trend) => trend === "downtrend")).toBe(true);
		expect(points[15].value).toBeCloseTo(76.2, 9);
	});

	it("should flip when the close exactly touches the final lower band", () => {
		const closes = [...steadyDecline, 81.5, 80.5, 79.5, 78.5, 77.5];
		const points = supertrendSeries(barsFromCloses(closes));
		const trends = points.map((point) => point.trend);

		expect(transitions(trends)).toEqual([15]);
		expect(points[15].value).toBeCloseTo(87.05, 9);
	});

	it("should keep every value undefined when no row has an ATR", () => {
		const points = supertrendSeries(barsFromCloses([5, 6, 7, 8, 9]));
		expect(points.map((point) => point.value)).toEqual([
			null,
			null,
			null,
			null,
			null,
		]);
		expect(points.every((point) => point.trend === "uptrend")).toBe(true);
	});

	it("should return nothing for an empty window", () => {
		expect(supertrendSeries([])).toEqual([]);
	});
});
