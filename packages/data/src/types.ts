import type { IsoDate, PricePoint } from "@indisync/core";

/** Daily price history for one symbol, ascending by date with no duplicates. */
export interface PriceSource {
	fetch(symbol: string, fromDate?: IsoDate): Promise<PricePoint[]>;
}

export interface OhlcvCandle {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export interface MarketDataClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit: number,
		since?: number
	): Promise<OhlcvCandle[]>;
}

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}
