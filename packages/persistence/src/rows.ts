import { INDICATOR_COLUMNS, type IndicatorRow } from "@indisync/core";

export const INDICATOR_TABLE = "stock_indicators_daily";

export const PERSISTED_COLUMNS: readonly string[] = [
	"ticker",
	"date",
	...INDICATOR_COLUMNS.map(([, column]) => column),
];

/** Positional values in `PERSISTED_COLUMNS` order. */
export const toRowValues = (ticker: string, row: IndicatorRow): unknown[] => [
	ticker,
	row.date,
	...INDICATOR_COLUMNS.map(([field]) => row[field]),
];

export const buildUpsertStatement = (rowCount: number): string => {
	const width = PERSISTED_COLUMNS.length;
	const tuples = Array.from(
		{ length: rowCount },
		(_, r) =>
			`(${PERSISTED_COLUMNS.map((_, c) => `$${r * width + c + 1}`).join(", ")})`
	);
	const updates = PERSISTED_COLUMNS.slice(2)
		.map((column) => `${column} = EXCLUDED.${column}`)
		.join(", ");
	return (
		`INSERT INTO ${INDICATOR_TABLE} (${PERSISTED_COLUMNS.join(", ")}) ` +
		`VALUES ${tuples.join(", ")} ` +
		`ON CONFLICT (ticker, date) DO UPDATE SET ${updates}`
	);
};

export const chunkRows = <T>(rows: readonly T[], size: number): T[][] => {
	const chunks: T[][] = [];
	for (let i = 0; i < rows.length; i += size) {
		chunks.push(rows.slice(i, i + size));
	}
	return chunks;
};
