export type { IndicatorSink } from "./types";
export {
	INDICATOR_TABLE,
	PERSISTED_COLUMNS,
	buildUpsertStatement,
	chunkRows,
	toRowValues,
} from "./rows";
export { PostgresIndicatorSink } from "./postgresIndicatorSink";
export type { PostgresIndicatorSinkOptions } from "./postgresIndicatorSink";
export { InMemoryIndicatorSink } from "./inMemoryIndicatorSink";
export type { RecordedWrite } from "./inMemoryIndicatorSink";
export {
	ALL_TICKERS_QUERY,
	PENDING_TICKERS_QUERY,
	PostgresSymbolUniverse,
} from "./symbolUniverse";
export { ensureIndicatorSchema, getDefaultSchemaPath } from "./schema";
