import { describe, expect, it } from "vitest";
import { buildUpsertStatement, chunkRows, toRowValues } from "./rows";
import { buildRow } from "./__tests__/rows";

describe("toRowValues", () => {
	it("should lay values out in persisted column order", () => {
		expect(toRowValues("ACME", buildRow("2024-01-02", { rsi: null }))).toEqual([
			"ACME",
			"2024-01-02",
			1,
			2,
			3,
			4,
			5,
			null,
			7,
			8,
			9,
			10,
			11,
		]);
	});
});

describe("buildUpsertStatement", () => {
	it("should build a keyed multi-row upsert", () => {
		expect(buildUpsertStatement(1)).toBe(
			"INSERT INTO stock_indicators_daily (ticker, date, ema_10, ema_20, ema_50, ema_100, ema_200, rsi, atr, supertrend, obv, ad, volume_surge) " +
				"VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13) " +
				"ON CONFLICT (ticker, date) DO UPDATE SET ema_10 = EXCLUDED.ema_10, ema_20 = EXCLUDED.ema_20, " +
				"ema_50 = EXCLUDED.ema_50, ema_100 = EXCLUDED.ema_100, ema_200 = EXCLUDED.ema_200, " +
				"rsi = EXCLUDED.rsi, atr = EXCLUDED.atr, supertrend = EXCLUDED.supertrend, " +
				"obv = EXCLUDED.obv, ad = EXCLUDED.ad, volume_surge = EXCLUDED.volume_surge"
		);
	});

	it("should number placeholders continuously across rows", () => {
		const statement = buildUpsertStatement(2);
		expect(statement).toContain("$13), ($14, $15,");
		expect(statement).toContain("$26) ON CONFLICT");
	});
});

describe("chunkRows", () => {
	it("should split into fixed-size chunks with a short tail", () => {
		expect(chunkRows([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
	});
});
