import { toSourceSymbol } from "@indisync/core";
import type { SyncCommand } from "./cliArgs";

export interface TickerUniverse {
	pendingTickers(): Promise<string[]>;
	allTickers(): Promise<string[]>;
}

/** Symbols to hand the price source, re-suffixed from stored tickers. */
export const resolveSymbols = async (
	command: SyncCommand,
	universe: TickerUniverse,
	sourceSuffix: string
): Promise<string[]> => {
	switch (command.mode) {
		case "single":
			return command.symbol ? [command.symbol] : [];
		case "update-all":
			return (await universe.pendingTickers()).map((ticker) =>
				toSourceSymbol(ticker, sourceSuffix)
			);
		case "recalculate-all":
			return (await universe.allTickers()).map((ticker) =>
				toSourceSymbol(ticker, sourceSuffix)
			);
	}
};
