import type { OHLCV } from "ccxt";
import { timestampToIsoDate, type PricePoint } from "@indisync/core";
import type { OhlcvCandle } from "../types";

export const mapCcxtRowToCandle = (row: OHLCV): OhlcvCandle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};

/** Daily candles are keyed by the UTC calendar date they open on. */
export const candleToPricePoint = (candle: OhlcvCandle): PricePoint => ({
	date: timestampToIsoDate(candle.timestamp),
	open: candle.open,
	high: candle.high,
	low: candle.low,
	close: candle.close,
	volume: candle.volume,
});
