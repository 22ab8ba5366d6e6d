export {
	CALENDAR_TO_TRADING_RATIO,
	maxLookback,
	resolveWarmupStart,
	warmupMarginDays,
} from "./warmup";
export { runWithConcurrency } from "./workerPool";
export type { PoolOutcome, WorkerPoolOptions } from "./workerPool";
export { IndicatorSyncController } from "./syncController";
export type {
	IndicatorSyncControllerOptions,
	SymbolSyncer,
	SyncOptions,
	SyncReport,
} from "./syncController";
export { DEFAULT_SYNC_CONCURRENCY, runIndicatorSync } from "./batchRunner";
export type {
	BatchRunOptions,
	BatchRunResult,
	SymbolFailure,
} from "./batchRunner";
