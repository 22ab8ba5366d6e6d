import { describe, expect, it } from "vitest";
import type { SqlClient, SqlResult } from "@indisync/core";
import {
	ALL_TICKERS_QUERY,
	PENDING_TICKERS_QUERY,
	PostgresSymbolUniverse,
} from "./symbolUniverse";

class RecordingClient implements SqlClient {
	readonly queries: string[] = [];

	constructor(private readonly rows: unknown[]) {}

	async query(text: string): Promise<SqlResult> {
		this.queries.push(text);
		return { rows: this.rows, rowCount: this.rows.length };
	}
}

describe("PostgresSymbolUniverse", () => {
	it("should list tickers whose prices run ahead of their indicators", async () => {
		const client = new RecordingClient([{ ticker: "INFY" }, { ticker: "TCS" }]);
		const universe = new PostgresSymbolUniverse(client);

		await expect(universe.pendingTickers()).resolves.toEqual(["INFY", "TCS"]);
		expect(client.queries).toEqual([PENDING_TICKERS_QUERY]);
		expect(PENDING_TICKERS_QUERY).toContain(
			"COALESCE(i.latest_indicator, DATE '1900-01-01')"
		);
	});

	it("should list every priced ticker and ignore malformed rows", async () => {
		const client = new RecordingClient([{ ticker: "INFY" }, { ticker: 42 }, null]);
		const universe = new PostgresSymbolUniverse(client);

		await expect(universe.allTickers()).resolves.toEqual(["INFY"]);
		expect(client.queries).toEqual([ALL_TICKERS_QUERY]);
	});
});
