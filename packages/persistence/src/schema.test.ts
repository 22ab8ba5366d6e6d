import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, type SqlClient, type SqlResult } from "@indisync/core";
import { ensureIndicatorSchema, getDefaultSchemaPath } from "./schema";

class RecordingClient implements SqlClient {
	readonly queries: string[] = [];

	async query(text: string): Promise<SqlResult> {
		this.queries.push(text);
		return { rows: [], rowCount: null };
	}
}

describe("ensureIndicatorSchema", () => {
	it("should run the bundled schema file", async () => {
		const client = new RecordingClient();
		await ensureIndicatorSchema(client);

		expect(path.basename(getDefaultSchemaPath())).toBe("schema.sql");
		expect(client.queries).toHaveLength(1);
		expect(client.queries[0]).toContain(
			"CREATE TABLE IF NOT EXISTS stock_indicators_daily"
		);
		expect(client.queries[0]).toContain("PRIMARY KEY (ticker, date)");
	});

	it("should fail with a ConfigError when the schema file is missing", async () => {
		const client = new RecordingClient();
		await expect(
			ensureIndicatorSchema(client, "/nonexistent/schema.sql")
		).rejects.toBeInstanceOf(ConfigError);
		expect(client.queries).toEqual([]);
	});
});
