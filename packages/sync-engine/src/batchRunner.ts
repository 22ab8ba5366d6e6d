import {
	EmptyPriceHistoryError,
	createLogger,
	getErrorCode,
	getErrorMessage,
	type IsoDate,
	type ModuleLogger,
	type SyncMode,
} from "@indisync/core";
import type { SymbolSyncer, SyncReport } from "./syncController";
import { runWithConcurrency } from "./workerPool";

export const DEFAULT_SYNC_CONCURRENCY = 4;

export interface BatchRunOptions {
	mode: SyncMode;
	concurrency?: number;
	signal?: AbortSignal;
	fromDate?: IsoDate;
	logger?: ModuleLogger;
}

export interface SymbolFailure {
	symbol: string;
	code: string;
	message: string;
}

export interface BatchRunResult {
	successCount: number;
	errorCount: number;
	cancelledCount: number;
	reports: SyncReport[];
	failures: SymbolFailure[];
}

/**
 * Sync every symbol through the controller with bounded concurrency.
 * One symbol failing never stops the others.
 */
export const runIndicatorSync = async (
	controller: SymbolSyncer,
	symbols: readonly string[],
	options: BatchRunOptions
): Promise<BatchRunResult> => {
	const logger = options.logger ?? createLogger("sync:batch");
	const concurrency = options.concurrency ?? DEFAULT_SYNC_CONCURRENCY;

	logger.info("sync_started", {
		mode: options.mode,
		symbols: symbols.length,
		concurrency,
		fromDate: options.fromDate,
	});

	const outcomes = await runWithConcurrency(
		symbols,
		concurrency,
		async (symbol) => {
			const report = await controller.sync(symbol, options.mode, {
				fromDate: options.fromDate,
			});
			logger.info("symbol_sync_completed", { ...report });
			return report;
		},
		{ signal: options.signal }
	);

	const result: BatchRunResult = {
		successCount: 0,
		errorCount: 0,
		cancelledCount: 0,
		reports: [],
		failures: [],
	};

	for (const outcome of outcomes) {
		switch (outcome.status) {
			case "fulfilled":
				result.successCount += 1;
				result.reports.push(outcome.value);
				break;
			case "rejected": {
				const failure: SymbolFailure = {
					symbol: outcome.item,
					code: getErrorCode(outcome.error),
					message: getErrorMessage(outcome.error),
				};
				result.errorCount += 1;
				result.failures.push(failure);
				logger.log(
					outcome.error instanceof EmptyPriceHistoryError ? "warn" : "error",
					"symbol_sync_failed",
					{ ...failure }
				);
				break;
			}
			case "cancelled":
				result.cancelledCount += 1;
				break;
		}
	}

	logger.info("sync_summary", {
		mode: options.mode,
		successCount: result.successCount,
		errorCount: result.errorCount,
		cancelledCount: result.cancelledCount,
		reports: result.reports.map((report) => ({
			symbol: report.symbol,
			status: report.status,
			rowsWritten: report.rowsWritten,
			firstDate: report.firstDate,
			lastDate: report.lastDate,
		})),
	});

	return result;
};
