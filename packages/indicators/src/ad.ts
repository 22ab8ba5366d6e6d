export interface AdInput {
	high: number;
	low: number;
	close: number;
	volume: number;
}

/** Money-flow multiplier; a zero-range bar contributes nothing. */
export const moneyFlowMultiplier = (candle: AdInput): number => {
	const range = candle.high - candle.low;
	if (range === 0) {
		return 0;
	}
	return (candle.close - candle.low - (candle.high - candle.close)) / range;
};

/** Accumulation/distribution line, cumulative from the first row of the window. */
export function adSeries(candles: readonly AdInput[]): number[] {
	const series: number[] = [];
	let ad = 0;
	candles.forEach((candle, i) => {
		const flow = moneyFlowMultiplier(candle) * candle.volume;
		ad = i === 0 ? flow : ad + flow;
		series.push(ad);
	});
	return series;
}
