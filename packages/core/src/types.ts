export * from "./time";

/** Calendar date in `YYYY-MM-DD` form. Lexicographic order equals date order. */
export type IsoDate = string;

export interface PricePoint {
	date: IsoDate;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const EMA_PERIODS = [10, 20, 50, 100, 200] as const;
export type EmaPeriod = (typeof EMA_PERIODS)[number];

const EMA_PERIOD_SET: ReadonlySet<number> = new Set(EMA_PERIODS);

export const isEmaPeriod = (value: number): value is EmaPeriod =>
	EMA_PERIOD_SET.has(value);

export interface IndicatorValues {
	ema10: number | null;
	ema20: number | null;
	ema50: number | null;
	ema100: number | null;
	ema200: number | null;
	rsi: number | null;
	atr: number | null;
	supertrend: number | null;
	obv: number | null;
	ad: number | null;
	volumeSurge: number | null;
}

export interface IndicatorRow extends IndicatorValues {
	/** Normalized ticker, the store key together with `date`. */
	symbol: string;
	date: IsoDate;
}

export type IndicatorField = keyof IndicatorValues;
export type EmaField = "ema10" | "ema20" | "ema50" | "ema100" | "ema200";

export const emaField = (period: EmaPeriod): EmaField => {
	switch (period) {
		case 10:
			return "ema10";
		case 20:
			return "ema20";
		case 50:
			return "ema50";
		case 100:
			return "ema100";
		case 200:
			return "ema200";
	}
};

/**
 * Value fields in persisted column order, paired with their column names.
 * `ticker` and `date` precede them in every stored row.
 */
export const INDICATOR_COLUMNS: ReadonlyArray<
	readonly [field: IndicatorField, column: string]
> = [
	["ema10", "ema_10"],
	["ema20", "ema_20"],
	["ema50", "ema_50"],
	["ema100", "ema_100"],
	["ema200", "ema_200"],
	["rsi", "rsi"],
	["atr", "atr"],
	["supertrend", "supertrend"],
	["obv", "obv"],
	["ad", "ad"],
	["volumeSurge", "volume_surge"],
];

export type SyncMode = "incremental" | "full_recalculate";

export type SyncStatus =
	| "cold_start"
	| "incremental"
	| "no_new_data"
	| "full_recalculate";
