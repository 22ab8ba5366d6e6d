import { smaSeries } from "./sma";

export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/** True range per row; row 0 has no previous close and stays null. */
export const trueRangeSeries = (
	candles: readonly AtrInput[]
): Array<number | null> =>
	candles.map((current, i) => {
		if (i === 0) {
			return null;
		}
		const previousClose = candles[i - 1].close;
		const highLow = current.high - current.low;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		return Math.max(highLow, highClose, lowClose);
	});

/** ATR as a rolling mean of true range; the first valid value sits at `period`. */
export function atrSeries(
	candles: readonly AtrInput[],
	period = 14
): Array<number | null> {
	return smaSeries(trueRangeSeries(candles), period);
}
