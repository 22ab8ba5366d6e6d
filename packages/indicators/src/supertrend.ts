import { atrSeries, type AtrInput } from "./atr";

export type TrendDirection = "uptrend" | "downtrend";

export interface SupertrendPoint {
	/** Final lower band in an uptrend, final upper band in a downtrend. */
	value: number | null;
	trend: TrendDirection;
}

interface Bands {
	upper: number | null;
	lower: number | null;
}

interface SupertrendState {
	trend: TrendDirection;
	close: number;
	bands: Bands;
}

// Comparisons against an undefined band are false, so undefined bands carry forward.
const lt = (a: number | null, b: number | null): boolean =>
	a !== null && b !== null && a < b;
const gt = (a: number | null, b: number | null): boolean =>
	a !== null && b !== null && a > b;

const basicBands = (
	candles: readonly AtrInput[],
	period: number,
	multiplier: number
): Bands[] => {
	const atr = atrSeries(candles, period);
	return candles.map((candle, i) => {
		const range = atr[i];
		if (range === null) {
			return { upper: null, lower: null };
		}
		const mid = (candle.high + candle.low) / 2;
		return {
			upper: mid + multiplier * range,
			lower: mid - multiplier * range,
		};
	});
};

/**
 * Supertrend over its own ATR. Final bands ratchet against the previous
 * row's basic band; the trend flips only when the close crosses the final
 * band on the opposite side.
 */
export function supertrendSeries(
	candles: readonly AtrInput[],
	period = 10,
	multiplier = 3.0
): SupertrendPoint[] {
	if (candles.length === 0) {
		return [];
	}

	const bands = basicBands(candles, period, multiplier);
	const series: SupertrendPoint[] = [
		{ value: bands[0].upper, trend: "uptrend" },
	];
	let state: SupertrendState = {
		trend: "uptrend",
		close: candles[0].close,
		bands: bands[0],
	};

	for (let i = 1; i < candles.length; i += 1) {
		const close = candles[i].close;
		const { upper, lower } = bands[i];
		const prev = state.bands;

		const finalUpper =
			lt(upper, prev.upper) || gt(state.close, prev.upper) ? upper : prev.upper;
		const finalLower =
			gt(lower, prev.lower) || lt(state.close, prev.lower) ? lower : prev.lower;

		let trend = state.trend;
		if (trend === "uptrend" && finalLower !== null && close <= finalLower) {
			trend = "downtrend";
		} else if (
			trend === "downtrend" &&
			finalUpper !== null &&
			close >= finalUpper
		) {
			trend = "uptrend";
		}

		series.push({
			value: trend === "uptrend" ? finalLower : finalUpper,
			trend,
		});
		state = { trend, close, bands: bands[i] };
	}

	return series;
}
