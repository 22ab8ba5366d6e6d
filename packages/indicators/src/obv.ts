export interface ObvInput {
	close: number;
	volume: number;
}

interface ObvState {
	obv: number;
	prevClose: number;
}

const stepObv = (state: ObvState, candle: ObvInput): ObvState => {
	if (candle.close > state.prevClose) {
		return { obv: state.obv + candle.volume, prevClose: candle.close };
	}
	if (candle.close < state.prevClose) {
		return { obv: state.obv - candle.volume, prevClose: candle.close };
	}
	return { obv: state.obv, prevClose: candle.close };
};

/**
 * On-balance volume. Strictly cumulative from the first row of the window,
 * which always starts at 0.
 */
export function obvSeries(candles: readonly ObvInput[]): number[] {
	if (candles.length === 0) {
		return [];
	}
	const series: number[] = [0];
	let state: ObvState = { obv: 0, prevClose: candles[0].close };
	for (let i = 1; i < candles.length; i += 1) {
		state = stepObv(state, candles[i]);
		series.push(state.obv);
	}
	return series;
}
