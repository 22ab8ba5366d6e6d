/**
 * The slice of a `pg` pool the sources and sinks rely on. A `pg.Pool`
 * satisfies it directly; tests hand in an in-process fake.
 */
export interface SqlResult {
	rows: unknown[];
	rowCount: number | null;
}

export interface SqlClient {
	query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface PooledSqlClient extends SqlClient {
	release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
	connect(): Promise<PooledSqlClient>;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);
