import {
	DEFAULT_INDICATOR_CONFIG,
	EMA_PERIODS,
	emaField,
	type EmaField,
	type IndicatorConfig,
	type IndicatorRow,
	type IndicatorValues,
	type PricePoint,
} from "@indisync/core";

import { adSeries } from "./ad";
import { atrSeries } from "./atr";
import { emaSeries } from "./ema";
import { obvSeries } from "./obv";
import { rsiSeries } from "./rsi";
import { finiteOrNull } from "./sma";
import { supertrendSeries } from "./supertrend";
import { volumeSurgeSeries } from "./volumeSurge";

type SeriesByField = { [K in keyof IndicatorValues]: ReadonlyArray<number | null> };

const emptySeries = (length: number): Array<number | null> =>
	new Array<number | null>(length).fill(null);

const emaColumns = (
	closes: readonly number[],
	config: IndicatorConfig
): Pick<SeriesByField, EmaField> => {
	const columns = {
		ema10: emptySeries(closes.length),
		ema20: emptySeries(closes.length),
		ema50: emptySeries(closes.length),
		ema100: emptySeries(closes.length),
		ema200: emptySeries(closes.length),
	};
	for (const period of EMA_PERIODS) {
		if (config.periods.ema.includes(period)) {
			columns[emaField(period)] = emaSeries(closes, period);
		}
	}
	return columns;
};

const valueAt = (
	series: ReadonlyArray<number | null>,
	i: number
): number | null => {
	const value = series[i];
	return value === null ? null : finiteOrNull(value);
};

/**
 * Compute every indicator over an ascending, de-duplicated window.
 * Output rows align one-to-one with the input; the same window always
 * yields identical values.
 */
export function computeIndicators(
	symbol: string,
	series: readonly PricePoint[],
	config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG
): IndicatorRow[] {
	if (series.length === 0) {
		return [];
	}

	const { periods } = config;
	const closes = series.map((point) => point.close);
	const volumes = series.map((point) => point.volume);

	const columns: SeriesByField = {
		...emaColumns(closes, config),
		rsi: rsiSeries(closes, periods.rsi),
		atr: atrSeries(series, periods.atr),
		supertrend: supertrendSeries(
			series,
			periods.supertrendPeriod,
			periods.supertrendMultiplier
		).map((point) => point.value),
		obv: obvSeries(series),
		ad: adSeries(series),
		volumeSurge: volumeSurgeSeries(volumes, periods.volumeSurgePeriod),
	};

	return series.map((point, i) => ({
		symbol,
		date: point.date,
		ema10: valueAt(columns.ema10, i),
		ema20: valueAt(columns.ema20, i),
		ema50: valueAt(columns.ema50, i),
		ema100: valueAt(columns.ema100, i),
		ema200: valueAt(columns.ema200, i),
		rsi: valueAt(columns.rsi, i),
		atr: valueAt(columns.atr, i),
		supertrend: valueAt(columns.supertrend, i),
		obv: valueAt(columns.obv, i),
		ad: valueAt(columns.ad, i),
		volumeSurge: valueAt(columns.volumeSurge, i),
	}));
}
