import { addDays, type IndicatorConfig, type IsoDate } from "@indisync/core";

/** Calendar days per trading day, allowing for weekends and holidays. */
export const CALENDAR_TO_TRADING_RATIO = 1.5;

export const warmupMarginDays = (maxPeriod: number): number =>
	Math.ceil(maxPeriod * CALENDAR_TO_TRADING_RATIO);

/**
 * Earliest date to fetch so that roughly `maxPeriod` trading rows precede
 * `targetStart`. `minMarginDays` can widen the window but never shrink it
 * below the scaled lookback. A short history is fine: the calculator just
 * emits more leading nulls.
 */
export const resolveWarmupStart = (
	targetStart: IsoDate,
	maxPeriod: number,
	minMarginDays = 0
): IsoDate => {
	if (maxPeriod <= 0) {
		return targetStart;
	}
	const margin = Math.max(minMarginDays, warmupMarginDays(maxPeriod));
	return addDays(targetStart, -margin);
};

export const maxLookback = (config: IndicatorConfig): number => {
	const { periods } = config;
	return Math.max(
		...periods.ema,
		periods.rsi,
		periods.atr,
		periods.supertrendPeriod,
		periods.volumeSurgePeriod
	);
};
