export * from "./types";
export { normalizePriceSeries } from "./normalize";
export { DAILY_TIMEFRAME, fetchHistoricalCandles } from "./historical";
export { ExchangePriceSource } from "./exchangePriceSource";
export type { ExchangePriceSourceOptions } from "./exchangePriceSource";
export { CcxtMarketDataClient } from "./ccxtClient";
export type { CcxtMarketDataClientOptions } from "./ccxtClient";
export {
	PRICE_HISTORY_QUERY,
	PostgresPriceSource,
	parsePriceRow,
} from "./postgresPriceSource";
export type { PostgresPriceSourceOptions } from "./postgresPriceSource";
export {
	DEFAULT_RETRY_POLICY,
	RetryingPriceSource,
	backoffDelay,
} from "./retryingPriceSource";
export type {
	RetryPolicy,
	RetryingPriceSourceOptions,
} from "./retryingPriceSource";
export { candleToPricePoint, mapCcxtRowToCandle } from "./utils/ccxtMapper";
