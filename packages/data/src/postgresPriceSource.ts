import {
	DEFAULT_MARKET_SUFFIXES,
	SourceFetchError,
	createLogger,
	isRecord,
	normalizeTicker,
	type IsoDate,
	type ModuleLogger,
	type PricePoint,
	type SqlClient,
} from "@indisync/core";
import { normalizePriceSeries } from "./normalize";
import type { PriceSource } from "./types";

export const PRICE_HISTORY_QUERY = `
	SELECT date::text AS date, open, high, low, close, volume
	FROM stock_price_daily
	WHERE ticker = $1 AND ($2::date IS NULL OR date >= $2::date)
	ORDER BY date ASC`;

export interface PostgresPriceSourceOptions {
	pool: SqlClient;
	marketSuffixes?: readonly string[];
	logger?: ModuleLogger;
}

// BIGINT and NUMERIC columns arrive as strings from pg.
const toFiniteNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim().length > 0) {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

export const parsePriceRow = (row: unknown): PricePoint | null => {
	if (!isRecord(row) || typeof row.date !== "string") {
		return null;
	}
	const open = toFiniteNumber(row.open);
	const high = toFiniteNumber(row.high);
	const low = toFiniteNumber(row.low);
	const close = toFiniteNumber(row.close);
	const volume = toFiniteNumber(row.volume);
	if (
		open === null ||
		high === null ||
		low === null ||
		close === null ||
		volume === null
	) {
		return null;
	}
	return { date: row.date, open, high, low, close, volume };
};

export class PostgresPriceSource implements PriceSource {
	private readonly logger: ModuleLogger;
	private readonly marketSuffixes: readonly string[];

	constructor(private readonly options: PostgresPriceSourceOptions) {
		this.logger = options.logger ?? createLogger("data:postgres");
		this.marketSuffixes = options.marketSuffixes ?? DEFAULT_MARKET_SUFFIXES;
	}

	async fetch(symbol: string, fromDate?: IsoDate): Promise<PricePoint[]> {
		const ticker = normalizeTicker(symbol, this.marketSuffixes);

		let rows: unknown[];
		try {
			const result = await this.options.pool.query(PRICE_HISTORY_QUERY, [
				ticker,
				fromDate ?? null,
			]);
			rows = result.rows;
		} catch (error) {
			throw new SourceFetchError(`Failed to read prices for ${ticker}`, error);
		}

		const points: PricePoint[] = [];
		let skipped = 0;
		for (const row of rows) {
			const point = parsePriceRow(row);
			if (point) {
				points.push(point);
			} else {
				skipped += 1;
			}
		}
		if (skipped > 0) {
			this.logger.warn("price_rows_skipped", { ticker, skipped });
		}

		return normalizePriceSeries(points);
	}
}
