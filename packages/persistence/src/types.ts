import type { IndicatorRow, IsoDate } from "@indisync/core";

export interface IndicatorSink {
	/** Latest stored date for the ticker, or null when nothing is stored yet. */
	latestDate(ticker: string): Promise<IsoDate | null>;
	/**
	 * Overwrite rows by `(ticker, date)`. The batch commits as a whole or not
	 * at all. Resolves to the number of rows written.
	 */
	upsert(ticker: string, rows: readonly IndicatorRow[]): Promise<number>;
}
