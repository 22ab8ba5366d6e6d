import {
	DEFAULT_INDICATOR_CONFIG,
	DEFAULT_MARKET_SUFFIXES,
	EmptyPriceHistoryError,
	addDays,
	createLogger,
	isIsoDate,
	normalizeTicker,
	type IndicatorConfig,
	type IsoDate,
	type ModuleLogger,
	type SyncMode,
	type SyncStatus,
} from "@indisync/core";
import type { PriceSource } from "@indisync/data";
import { computeIndicators } from "@indisync/indicators";
import type { IndicatorSink } from "@indisync/persistence";
import { maxLookback, resolveWarmupStart } from "./warmup";

export interface SyncOptions {
	/** Recompute from this date instead of the day after the stored cursor */
	fromDate?: IsoDate;
}

export interface SyncReport {
	symbol: string;
	ticker: string;
	mode: SyncMode;
	status: SyncStatus;
	rowsWritten: number;
	/** First date whose rows are persisted; null means the whole history */
	targetFrom: IsoDate | null;
	/** Start of the fetched window including warmup; null means unbounded */
	fetchFrom: IsoDate | null;
	firstDate: IsoDate | null;
	lastDate: IsoDate | null;
}

export interface SymbolSyncer {
	sync(symbol: string, mode: SyncMode, options?: SyncOptions): Promise<SyncReport>;
}

export interface IndicatorSyncControllerOptions {
	source: PriceSource;
	sink: IndicatorSink;
	config?: IndicatorConfig;
	marketSuffixes?: readonly string[];
	logger?: ModuleLogger;
}

interface SyncPlan {
	status: SyncStatus;
	targetFrom: IsoDate | null;
	fetchFrom: IsoDate | null;
}

const FULL_HISTORY: Omit<SyncPlan, "status"> = {
	targetFrom: null,
	fetchFrom: null,
};

/**
 * Brings one symbol's stored indicators up to date with its price history.
 * Recursive indicators are always recomputed over a warmup window before
 * the rows past the cursor are sliced off and upserted.
 */
export class IndicatorSyncController implements SymbolSyncer {
	private readonly config: IndicatorConfig;
	private readonly marketSuffixes: readonly string[];
	private readonly logger: ModuleLogger;

	constructor(private readonly options: IndicatorSyncControllerOptions) {
		this.config = options.config ?? DEFAULT_INDICATOR_CONFIG;
		this.marketSuffixes = options.marketSuffixes ?? DEFAULT_MARKET_SUFFIXES;
		this.logger = options.logger ?? createLogger("sync:controller");
	}

	async sync(
		symbol: string,
		mode: SyncMode,
		options: SyncOptions = {}
	): Promise<SyncReport> {
		const ticker = normalizeTicker(symbol, this.marketSuffixes);
		const plan = await this.plan(ticker, mode, options);
		this.logger.debug("symbol_sync_planned", { symbol, ticker, mode, ...plan });

		const prices = await this.options.source.fetch(
			symbol,
			plan.fetchFrom ?? undefined
		);
		if (prices.length === 0) {
			throw new EmptyPriceHistoryError(symbol);
		}

		const rows = computeIndicators(ticker, prices, this.config);
		const { targetFrom } = plan;
		const pending =
			targetFrom === null ? rows : rows.filter((row) => row.date >= targetFrom);

		const report: SyncReport = {
			symbol,
			ticker,
			mode,
			...plan,
			rowsWritten: 0,
			firstDate: pending.length ? pending[0].date : null,
			lastDate: pending.length ? pending[pending.length - 1].date : null,
		};

		if (pending.length === 0) {
			this.logger.info("symbol_up_to_date", {
				ticker,
				targetFrom,
				fetched: prices.length,
			});
			return { ...report, status: "no_new_data" };
		}

		const rowsWritten = await this.options.sink.upsert(ticker, pending);
		return { ...report, rowsWritten };
	}

	private async plan(
		ticker: string,
		mode: SyncMode,
		options: SyncOptions
	): Promise<SyncPlan> {
		if (mode === "full_recalculate") {
			return { status: "full_recalculate", ...FULL_HISTORY };
		}

		let targetFrom: IsoDate;
		if (options.fromDate !== undefined) {
			if (!isIsoDate(options.fromDate)) {
				throw new Error(`Invalid from date "${options.fromDate}"`);
			}
			targetFrom = options.fromDate;
		} else {
			const cursor = await this.options.sink.latestDate(ticker);
			if (cursor === null) {
				return { status: "cold_start", ...FULL_HISTORY };
			}
			targetFrom = addDays(cursor, 1);
		}

		return {
			status: "incremental",
			targetFrom,
			fetchFrom: resolveWarmupStart(
				targetFrom,
				maxLookback(this.config),
				this.config.warmupMarginDays
			),
		};
	}
}
