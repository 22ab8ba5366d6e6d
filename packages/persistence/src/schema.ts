import fs from "node:fs/promises";
import path from "node:path";
import {
	ConfigError,
	createLogger,
	getWorkspaceRoot,
	type SqlClient,
} from "@indisync/core";

const schemaLogger = createLogger("persistence:schema");

export const getDefaultSchemaPath = (): string =>
	path.join(getWorkspaceRoot(), "db", "schema.sql");

/** Create the price and indicator tables when they do not exist yet. */
export const ensureIndicatorSchema = async (
	pool: SqlClient,
	schemaPath = getDefaultSchemaPath()
): Promise<void> => {
	let sql: string;
	try {
		sql = await fs.readFile(schemaPath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Schema file not found: ${schemaPath}`, error);
	}
	await pool.query(sql);
	schemaLogger.info("schema_ensured", { schemaPath });
};
