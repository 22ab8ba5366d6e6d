import { describe, it, expect } from "vitest";
import {
	addDays,
	compareIsoDates,
	formatIsoDate,
	isIsoDate,
	parseIsoDate,
	timestampToIsoDate,
	todayIsoDate,
} from "./dates";

describe("date utilities", () => {
	describe("parseIsoDate", () => {
		it("should parse calendar dates at UTC midnight", () => {
			expect(parseIsoDate("2024-01-01")).toBe(Date.UTC(2024, 0, 1));
			expect(parseIsoDate("2024-02-29")).toBe(Date.UTC(2024, 1, 29));
		});

		it("should tolerate surrounding whitespace", () => {
			expect(parseIsoDate(" 2024-03-15\n")).toBe(Date.UTC(2024, 2, 15));
		});

		it("should throw on malformed or impossible dates", () => {
			expect(() => parseIsoDate("2024-1-1")).toThrow("Invalid date");
			expect(() => parseIsoDate("2023-02-29")).toThrow("Invalid date");
			expect(() => parseIsoDate("2024-13-01")).toThrow("Invalid date");
			expect(() => parseIsoDate("")).toThrow("Invalid date");
		});
	});

	describe("isIsoDate", () => {
		it("should accept real dates only", () => {
			expect(isIsoDate("2025-12-31")).toBe(true);
			expect(isIsoDate("2025-04-31")).toBe(false);
			expect(isIsoDate("20250101")).toBe(false);
		});
	});

	describe("formatIsoDate", () => {
		it("should format epoch milliseconds", () => {
			expect(formatIsoDate(Date.UTC(2025, 6, 4))).toBe("2025-07-04");
		});

		it("should throw on non-finite input", () => {
			expect(() => formatIsoDate(Number.NaN)).toThrow("Invalid timestamp");
		});
	});

	describe("timestampToIsoDate", () => {
		it("should truncate intraday timestamps", () => {
			expect(timestampToIsoDate(Date.UTC(2025, 0, 2, 23, 59, 59))).toBe(
				"2025-01-02"
			);
		});
	});

	describe("addDays", () => {
		it("should step across month and year boundaries", () => {
			expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
			expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
		});

		it("should subtract large calendar margins", () => {
			expect(addDays("2025-01-01", -300)).toBe("2024-03-07");
		});

		it("should reject fractional offsets", () => {
			expect(() => addDays("2025-01-01", 1.5)).toThrow(
				"Day offset must be an integer"
			);
		});
	});

	describe("compareIsoDates", () => {
		it("should order dates chronologically", () => {
			expect(compareIsoDates("2024-01-02", "2024-01-10")).toBe(-1);
			expect(compareIsoDates("2024-01-10", "2024-01-02")).toBe(1);
			expect(compareIsoDates("2024-01-10", "2024-01-10")).toBe(0);
		});
	});

	describe("todayIsoDate", () => {
		it("should use the UTC calendar date of the given instant", () => {
			expect(todayIsoDate(new Date(Date.UTC(2025, 5, 30, 18)))).toBe(
				"2025-06-30"
			);
		});
	});
});
