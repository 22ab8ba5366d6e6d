import { DAY_MS } from "@indisync/core";
import type { DataProviderLogger, MarketDataClient, OhlcvCandle } from "./types";

export const DAILY_TIMEFRAME = "1d";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

interface HistoricalFetchOptions {
	client: MarketDataClient;
	symbol: string;
	startTimestamp: number;
	endTimestamp: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}

/**
 * Page daily candles forward from `startTimestamp` until the client runs dry
 * or a candle passes `endTimestamp`. Repeated timestamps across pages are
 * dropped.
 */
export const fetchHistoricalCandles = async (
	options: HistoricalFetchOptions
): Promise<OhlcvCandle[]> => {
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);

	const result: OhlcvCandle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, options.startTimestamp);
	let iterations = 0;

	while (since <= options.endTimestamp && iterations < maxIterations) {
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			DAILY_TIMEFRAME,
			batchSize,
			since
		);

		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp > options.endTimestamp) {
				return result;
			}
			if (
				candle.timestamp >= options.startTimestamp &&
				!seenTimestamps.has(candle.timestamp)
			) {
				result.push(candle);
				seenTimestamps.add(candle.timestamp);
			}
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + DAY_MS, since + DAY_MS);
		iterations += 1;
	}

	if (iterations >= maxIterations) {
		options.logger?.warn?.("historical_fetch_iterations_exceeded", {
			symbol: options.symbol,
			startTimestamp: options.startTimestamp,
			endTimestamp: options.endTimestamp,
			iterations,
			maxIterations,
		});
	}

	return result;
};
