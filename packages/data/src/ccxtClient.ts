import ccxt, { type Exchange, type OHLCV } from "ccxt";
import { createLogger, type ExchangeId } from "@indisync/core";
import type { MarketDataClient, OhlcvCandle } from "./types";
import { mapCcxtRowToCandle } from "./utils/ccxtMapper";

const ccxtLogger = createLogger("data:ccxt");

export interface CcxtMarketDataClientOptions {
	exchangeId: ExchangeId;
	/** Pre-built exchange instance, used instead of constructing one from `exchangeId` */
	exchange?: Exchange;
}

const createExchange = (exchangeId: ExchangeId): Exchange => {
	switch (exchangeId) {
		case "binance":
			return new ccxt.binance({ enableRateLimit: true });
		case "mexc":
			return new ccxt.mexc({ enableRateLimit: true });
		case "kraken":
			return new ccxt.kraken({ enableRateLimit: true });
	}
};

export class CcxtMarketDataClient implements MarketDataClient {
	private readonly exchange: Exchange;
	private marketsLoaded = false;

	constructor(private readonly options: CcxtMarketDataClientOptions) {
		this.exchange = options.exchange ?? createExchange(options.exchangeId);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<OhlcvCandle[]> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		const ohlcv = await this.exchange.fetchOHLCV(
			marketSymbol,
			timeframe,
			since,
			limit
		);
		ccxtLogger.debug("ohlcv_page_fetched", {
			exchange: this.options.exchangeId,
			symbol: marketSymbol,
			since,
			count: ohlcv.length,
		});
		return ohlcv.map((row: OHLCV) => mapCcxtRowToCandle(row));
	}

	private async resolveMarketSymbol(symbol: string): Promise<string> {
		await this.ensureMarketsLoaded();
		try {
			return this.exchange.market(symbol).symbol;
		} catch (error) {
			throw new Error(
				`Unknown ${this.options.exchangeId} market symbol for ${symbol}`,
				{ cause: error }
			);
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
