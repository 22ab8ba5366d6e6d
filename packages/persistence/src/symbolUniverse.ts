import { isRecord, type SqlClient } from "@indisync/core";
import { INDICATOR_TABLE } from "./rows";

const PRICE_TABLE = "stock_price_daily";

export const PENDING_TICKERS_QUERY = `
	SELECT p.ticker
	FROM (SELECT ticker, max(date) AS latest_price FROM ${PRICE_TABLE} GROUP BY ticker) p
	LEFT JOIN (
		SELECT ticker, max(date) AS latest_indicator FROM ${INDICATOR_TABLE} GROUP BY ticker
	) i ON i.ticker = p.ticker
	WHERE p.latest_price > COALESCE(i.latest_indicator, DATE '1900-01-01')
	ORDER BY p.ticker`;

export const ALL_TICKERS_QUERY = `SELECT DISTINCT ticker FROM ${PRICE_TABLE} ORDER BY ticker`;

const readTickers = (rows: unknown[]): string[] =>
	rows.flatMap((row) =>
		isRecord(row) && typeof row.ticker === "string" ? [row.ticker] : []
	);

/** Tickers known to the price table, optionally narrowed to those behind on indicators. */
export class PostgresSymbolUniverse {
	constructor(private readonly pool: SqlClient) {}

	async pendingTickers(): Promise<string[]> {
		const result = await this.pool.query(PENDING_TICKERS_QUERY);
		return readTickers(result.rows);
	}

	async allTickers(): Promise<string[]> {
		const result = await this.pool.query(ALL_TICKERS_QUERY);
		return readTickers(result.rows);
	}
}
