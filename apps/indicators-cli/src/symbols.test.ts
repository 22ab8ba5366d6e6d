import { describe, it, expect } from "vitest";
import type { SyncCommand } from "./cliArgs";
import { resolveSymbols, type TickerUniverse } from "./symbols";

const universe: TickerUniverse = {
	pendingTickers: async () => ["INFY", "TCS"],
	allTickers: async () => ["INFY", "RELIANCE", "TCS"],
};

const command = (overrides: Partial<SyncCommand>): SyncCommand => ({
	mode: "update-all",
	profile: "default",
	...overrides,
});

describe("resolveSymbols", () => {
	it("should use the given symbol as is in single mode", async () => {
		await expect(
			resolveSymbols(command({ mode: "single", symbol: "BTC/USDT" }), universe, ".NS")
		).resolves.toEqual(["BTC/USDT"]);
	});

	it("should re-suffix pending tickers for an update run", async () => {
		await expect(resolveSymbols(command({}), universe, ".NS")).resolves.toEqual([
			"INFY.NS",
			"TCS.NS",
		]);
	});

	it("should take every ticker for a full recalculation", async () => {
		await expect(
			resolveSymbols(command({ mode: "recalculate-all" }), universe, "")
		).resolves.toEqual(["INFY", "RELIANCE", "TCS"]);
	});
});
