import {
	SinkWriteError,
	createLogger,
	getErrorMessage,
	isRecord,
	type IndicatorRow,
	type IsoDate,
	type ModuleLogger,
	type PooledSqlClient,
	type SqlPool,
} from "@indisync/core";
import {
	INDICATOR_TABLE,
	buildUpsertStatement,
	chunkRows,
	toRowValues,
} from "./rows";
import type { IndicatorSink } from "./types";

// 1000 rows x 13 columns stays well under the 65535 bind-parameter limit.
const DEFAULT_CHUNK_SIZE = 1000;

const LATEST_DATE_QUERY = `SELECT max(date)::text AS latest FROM ${INDICATOR_TABLE} WHERE ticker = $1`;

export interface PostgresIndicatorSinkOptions {
	pool: SqlPool;
	chunkSize?: number;
	logger?: ModuleLogger;
}

export class PostgresIndicatorSink implements IndicatorSink {
	private readonly chunkSize: number;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: PostgresIndicatorSinkOptions) {
		this.chunkSize = Math.max(options.chunkSize ?? DEFAULT_CHUNK_SIZE, 1);
		this.logger = options.logger ?? createLogger("persistence:postgres");
	}

	async latestDate(ticker: string): Promise<IsoDate | null> {
		const result = await this.options.pool.query(LATEST_DATE_QUERY, [ticker]);
		const row = result.rows[0];
		return isRecord(row) && typeof row.latest === "string" ? row.latest : null;
	}

	async upsert(ticker: string, rows: readonly IndicatorRow[]): Promise<number> {
		if (rows.length === 0) {
			return 0;
		}

		let client: PooledSqlClient;
		try {
			client = await this.options.pool.connect();
		} catch (error) {
			throw new SinkWriteError(ticker, error);
		}

		let releaseError: Error | undefined;
		try {
			await client.query("BEGIN");
			let written = 0;
			const chunks = chunkRows(rows, this.chunkSize);
			for (const chunk of chunks) {
				const result = await client.query(
					buildUpsertStatement(chunk.length),
					chunk.flatMap((row) => toRowValues(ticker, row))
				);
				written += result.rowCount ?? chunk.length;
			}
			await client.query("COMMIT");
			this.logger.info("indicator_upsert_committed", {
				ticker,
				rows: written,
				chunks: chunks.length,
			});
			return written;
		} catch (error) {
			releaseError = await this.rollback(client, ticker);
			throw new SinkWriteError(ticker, error);
		} finally {
			client.release(releaseError);
		}
	}

	/** Returns the rollback failure, if any, so the connection is discarded. */
	private async rollback(
		client: PooledSqlClient,
		ticker: string
	): Promise<Error | undefined> {
		try {
			await client.query("ROLLBACK");
			this.logger.warn("indicator_upsert_rolled_back", { ticker });
			return undefined;
		} catch (error) {
			this.logger.error("indicator_rollback_failed", {
				ticker,
				error: getErrorMessage(error),
			});
			return error instanceof Error ? error : new Error(getErrorMessage(error));
		}
	}
}
