import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import { isRecord } from "./sql";
import { DEFAULT_MARKET_SUFFIXES } from "./symbols";
import { EMA_PERIODS, type EmaPeriod, isEmaPeriod } from "./types";

export interface IndicatorPeriods {
	ema: EmaPeriod[];
	rsi: number;
	atr: number;
	supertrendPeriod: number;
	supertrendMultiplier: number;
	volumeSurgePeriod: number;
}

export interface IndicatorConfig {
	periods: IndicatorPeriods;
	/** Minimum calendar days fetched before the incremental start; longer lookbacks widen it */
	warmupMarginDays: number;
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
	periods: {
		ema: [...EMA_PERIODS],
		rsi: 14,
		atr: 14,
		supertrendPeriod: 10,
		supertrendMultiplier: 3.0,
		volumeSurgePeriod: 20,
	},
	warmupMarginDays: 300,
};

export type ConfigSourceType = "file" | "embedded" | "env";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("indisync.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", path.join("config", "indicators")];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultEnvPath = (): string =>
	path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readJsonFile = (filePath: string): unknown => {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Config file not found: ${filePath}`, error);
	}
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(`Config file is not valid JSON: ${filePath}`, error);
	}
};

const ensureNumber = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive number`);
	}
	return value;
};

const ensurePeriod = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	const period = ensureNumber(value, field, fallback);
	if (!Number.isInteger(period)) {
		throw new ConfigError(`${field} must be a whole number of rows`);
	}
	return period;
};

const parseEmaPeriods = (value: unknown): EmaPeriod[] => {
	if (value === undefined) {
		return [...DEFAULT_INDICATOR_CONFIG.periods.ema];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError("periods.ema must be an array of periods");
	}
	const periods = new Set<EmaPeriod>();
	for (const entry of value) {
		if (typeof entry !== "number" || !isEmaPeriod(entry)) {
			throw new ConfigError(
				`Unsupported EMA period ${String(entry)}; expected one of ${EMA_PERIODS.join(", ")}`
			);
		}
		periods.add(entry);
	}
	return Array.from(periods).sort((a, b) => a - b);
};

/**
 * Validate a raw config document, filling omitted fields from the defaults.
 */
export const parseIndicatorConfig = (raw: unknown): IndicatorConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("Indicator config must be a JSON object");
	}
	const periods = raw.periods === undefined ? {} : raw.periods;
	if (!isRecord(periods)) {
		throw new ConfigError("periods must be an object");
	}
	const defaults = DEFAULT_INDICATOR_CONFIG.periods;
	return {
		periods: {
			ema: parseEmaPeriods(periods.ema),
			rsi: ensurePeriod(periods.rsi, "periods.rsi", defaults.rsi),
			atr: ensurePeriod(periods.atr, "periods.atr", defaults.atr),
			supertrendPeriod: ensurePeriod(
				periods.supertrendPeriod,
				"periods.supertrendPeriod",
				defaults.supertrendPeriod
			),
			supertrendMultiplier: ensureNumber(
				periods.supertrendMultiplier,
				"periods.supertrendMultiplier",
				defaults.supertrendMultiplier
			),
			volumeSurgePeriod: ensurePeriod(
				periods.volumeSurgePeriod,
				"periods.volumeSurgePeriod",
				defaults.volumeSurgePeriod
			),
		},
		warmupMarginDays: ensurePeriod(
			raw.warmupMarginDays,
			"warmupMarginDays",
			DEFAULT_INDICATOR_CONFIG.warmupMarginDays
		),
	};
};

export const resolveIndicatorConfigPath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "indicators", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		`Indicator config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadIndicatorConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): IndicatorConfig => {
	const configPath = resolveIndicatorConfigPath(configDir, profile);
	return withConfigMetadata(parseIndicatorConfig(readJsonFile(configPath)), {
		source: "file",
		path: configPath,
		profile,
	});
};

export const EXCHANGE_IDS = ["binance", "mexc", "kraken"] as const;
export type ExchangeId = (typeof EXCHANGE_IDS)[number];
export type PriceSourceKind = "postgres" | ExchangeId;

const EXCHANGE_ID_SET: ReadonlySet<string> = new Set(EXCHANGE_IDS);

const isExchangeId = (value: string): value is ExchangeId =>
	EXCHANGE_ID_SET.has(value);

export interface EnvConfig {
	databaseUrl?: string;
	priceSource: PriceSourceKind;
	syncConcurrency: number;
	/** Suffixes stripped from symbols to form store keys */
	marketSuffixes: string[];
	/** Suffix appended to stored tickers when asking the price source */
	sourceSuffix: string;
}

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
	if (value === undefined) {
		return undefined;
	}
	return value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
};

const normalizePriceSource = (value: string | undefined): PriceSourceKind => {
	const normalized = (value ?? "postgres").toLowerCase();
	if (normalized === "postgres" || isExchangeId(normalized)) {
		return normalized;
	}
	throw new ConfigError(
		`Unsupported PRICE_SOURCE "${normalized}"; expected postgres or one of ${EXCHANGE_IDS.join(", ")}`
	);
};

const parseConcurrency = (value: string | undefined): number => {
	if (value === undefined) {
		return 4;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new ConfigError(
			`SYNC_CONCURRENCY must be a positive integer, got "${value}"`
		);
	}
	return parsed;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		databaseUrl: readOptionalEnvVar("DATABASE_URL"),
		priceSource: normalizePriceSource(readOptionalEnvVar("PRICE_SOURCE")),
		syncConcurrency: parseConcurrency(readOptionalEnvVar("SYNC_CONCURRENCY")),
		marketSuffixes: parseList(readOptionalEnvVar("MARKET_SUFFIXES")) ?? [
			...DEFAULT_MARKET_SUFFIXES,
		],
		sourceSuffix: process.env.SOURCE_SUFFIX?.trim() ?? ".NS",
	};
};
