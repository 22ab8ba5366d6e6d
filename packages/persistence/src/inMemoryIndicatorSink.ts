import {
	SinkWriteError,
	compareIsoDates,
	type IndicatorRow,
	type IsoDate,
} from "@indisync/core";
import type { IndicatorSink } from "./types";

export interface RecordedWrite {
	ticker: string;
	dates: IsoDate[];
}

/**
 * In-process sink. Each upsert is staged against a copy of the ticker's
 * table and swapped in only when the whole batch succeeds.
 */
export class InMemoryIndicatorSink implements IndicatorSink {
	private readonly tables = new Map<string, Map<IsoDate, IndicatorRow>>();
	private readonly pendingFailures = new Map<string, unknown>();
	readonly writes: RecordedWrite[] = [];

	/** Make the next upsert for `ticker` fail after staging its rows. */
	failNextUpsert(
		ticker: string,
		cause: unknown = new Error("injected failure")
	): void {
		this.pendingFailures.set(ticker, cause);
	}

	seed(ticker: string, rows: readonly IndicatorRow[]): void {
		const table = this.tables.get(ticker) ?? new Map<IsoDate, IndicatorRow>();
		for (const row of rows) {
			table.set(row.date, { ...row });
		}
		this.tables.set(ticker, table);
	}

	rows(ticker: string): IndicatorRow[] {
		const table = this.tables.get(ticker);
		if (!table) {
			return [];
		}
		return Array.from(table.values()).sort((a, b) =>
			compareIsoDates(a.date, b.date)
		);
	}

	async latestDate(ticker: string): Promise<IsoDate | null> {
		let latest: IsoDate | null = null;
		for (const date of this.tables.get(ticker)?.keys() ?? []) {
			if (latest === null || compareIsoDates(date, latest) > 0) {
				latest = date;
			}
		}
		return latest;
	}

	async upsert(ticker: string, rows: readonly IndicatorRow[]): Promise<number> {
		if (rows.length === 0) {
			return 0;
		}

		const staged = new Map<IsoDate, IndicatorRow>(
			this.tables.get(ticker) ?? []
		);
		for (const row of rows) {
			staged.set(row.date, { ...row, symbol: ticker });
		}

		if (this.pendingFailures.has(ticker)) {
			const cause = this.pendingFailures.get(ticker);
			this.pendingFailures.delete(ticker);
			throw new SinkWriteError(ticker, cause);
		}

		this.tables.set(ticker, staged);
		this.writes.push({ ticker, dates: rows.map((row) => row.date) });
		return rows.length;
	}
}
