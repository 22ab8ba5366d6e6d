import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
	DEFAULT_INDICATOR_CONFIG,
	getConfigMetadata,
	loadEnvConfig,
	loadIndicatorConfig,
	parseIndicatorConfig,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const MISSING_ENV = path.join(FIXTURE_DIR, "does-not-exist.env");

describe("parseIndicatorConfig", () => {
	it("should fill every omitted field from the defaults", () => {
		expect(parseIndicatorConfig({})).toEqual(DEFAULT_INDICATOR_CONFIG);
	});

	it("should reject non-object documents", () => {
		expect(() => parseIndicatorConfig([1, 2])).toThrow(ConfigError);
	});

	it("should reject fractional periods", () => {
		expect(() =>
			parseIndicatorConfig({ periods: { atr: 14.5 } })
		).toThrowError(/periods.atr must be a whole number/);
	});
});

describe("loadIndicatorConfig", () => {
	it("should merge a partial profile and dedupe EMA periods", () => {
		const config = loadIndicatorConfig(FIXTURE_DIR, "partial");
		expect(config.periods.ema).toEqual([20, 200]);
		expect(config.periods.rsi).toBe(21);
		expect(config.periods.atr).toBe(14);
		expect(config.warmupMarginDays).toBe(300);
	});

	it("should record where the profile was loaded from", () => {
		const config = loadIndicatorConfig(FIXTURE_DIR, "partial");
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "indicators", "partial.json"),
			profile: "partial",
		});
	});

	it("should throw on EMA periods without a column", () => {
		expect(() => loadIndicatorConfig(FIXTURE_DIR, "bad-ema")).toThrowError(
			/Unsupported EMA period 30/
		);
	});

	it("should throw on a non-positive multiplier", () => {
		expect(() =>
			loadIndicatorConfig(FIXTURE_DIR, "bad-multiplier")
		).toThrowError(/supertrendMultiplier must be a positive number/);
	});

	it("should throw on invalid JSON", () => {
		expect(() => loadIndicatorConfig(FIXTURE_DIR, "truncated")).toThrowError(
			/not valid JSON/
		);
	});

	it("should throw when the profile does not exist", () => {
		expect(() => loadIndicatorConfig(FIXTURE_DIR, "nope")).toThrowError(
			/Indicator config not found/
		);
	});
});

describe("loadEnvConfig", () => {
	const keys = [
		"DATABASE_URL",
		"PRICE_SOURCE",
		"SYNC_CONCURRENCY",
		"MARKET_SUFFIXES",
		"SOURCE_SUFFIX",
	];
	const saved = new Map(keys.map((key) => [key, process.env[key]]));

	afterEach(() => {
		for (const [key, value] of saved) {
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
	});

	it("should read database, source and pool settings", () => {
		process.env.DATABASE_URL = "postgres://localhost/indicators_test";
		process.env.PRICE_SOURCE = "Binance";
		process.env.SYNC_CONCURRENCY = "8";
		process.env.MARKET_SUFFIXES = ".L, .DE";
		process.env.SOURCE_SUFFIX = "";

		expect(loadEnvConfig(MISSING_ENV)).toEqual({
			databaseUrl: "postgres://localhost/indicators_test",
			priceSource: "binance",
			syncConcurrency: 8,
			marketSuffixes: [".L", ".DE"],
			sourceSuffix: "",
		});
	});

	it("should fall back to defaults", () => {
		for (const key of keys) {
			delete process.env[key];
		}
		expect(loadEnvConfig(MISSING_ENV)).toEqual({
			databaseUrl: undefined,
			priceSource: "postgres",
			syncConcurrency: 4,
			marketSuffixes: [".NS", ".BO"],
			sourceSuffix: ".NS",
		});
	});

	it("should reject unknown sources and bad concurrency", () => {
		process.env.PRICE_SOURCE = "bloomberg";
		expect(() => loadEnvConfig(MISSING_ENV)).toThrowError(
			/Unsupported PRICE_SOURCE "bloomberg"/
		);
		process.env.PRICE_SOURCE = "postgres";
		process.env.SYNC_CONCURRENCY = "0";
		expect(() => loadEnvConfig(MISSING_ENV)).toThrowError(
			/SYNC_CONCURRENCY must be a positive integer/
		);
	});
});
