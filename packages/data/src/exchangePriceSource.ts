import {
	DAY_MS,
	SourceFetchError,
	parseIsoDate,
	todayIsoDate,
	type IsoDate,
	type PricePoint,
} from "@indisync/core";
import { fetchHistoricalCandles } from "./historical";
import { normalizePriceSeries } from "./normalize";
import type { DataProviderLogger, MarketDataClient, PriceSource } from "./types";
import { candleToPricePoint } from "./utils/ccxtMapper";

const DEFAULT_EARLIEST_DATE = "2000-01-01";

export interface ExchangePriceSourceOptions {
	client: MarketDataClient;
	/** Where a fetch without `fromDate` starts paging */
	earliestDate?: IsoDate;
	batchSize?: number;
	maxIterations?: number;
	now?: () => Date;
	logger?: DataProviderLogger;
}

export class ExchangePriceSource implements PriceSource {
	constructor(private readonly options: ExchangePriceSourceOptions) {}

	async fetch(symbol: string, fromDate?: IsoDate): Promise<PricePoint[]> {
		const startTimestamp = parseIsoDate(
			fromDate ?? this.options.earliestDate ?? DEFAULT_EARLIEST_DATE
		);
		const endTimestamp =
			parseIsoDate(todayIsoDate(this.options.now?.())) + DAY_MS - 1;

		try {
			const candles = await fetchHistoricalCandles({
				client: this.options.client,
				symbol,
				startTimestamp,
				endTimestamp,
				batchSize: this.options.batchSize,
				maxIterations: this.options.maxIterations,
				logger: this.options.logger,
			});
			return normalizePriceSeries(candles.map(candleToPricePoint));
		} catch (error) {
			throw new SourceFetchError(
				`Failed to fetch daily candles for ${symbol}`,
				error
			);
		}
	}
}
