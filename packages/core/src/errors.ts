/**
 * Error hierarchy shared by every package.
 *
 * All errors raised for a single symbol are recoverable at the batch level;
 * only `ConfigError` is meant to stop a process.
 */

export abstract class IndisyncError extends Error {
	/** Stable code for programmatic handling and log payloads */
	abstract readonly code: string;

	constructor(
		message: string,
		public override readonly cause?: unknown
	) {
		super(message);
		this.name = this.constructor.name;
	}
}

/** The price source returned no rows for a symbol. */
export class EmptyPriceHistoryError extends IndisyncError {
	readonly code = "EMPTY_PRICE_HISTORY" as const;

	constructor(
		public readonly symbol: string,
		cause?: unknown
	) {
		super(`No price history available for ${symbol}`, cause);
	}
}

/** A price fetch failed (network, rate limit, query error). */
export class SourceFetchError extends IndisyncError {
	readonly code = "SOURCE_FETCH_FAILED" as const;
}

/** A sink write or transaction failed; the symbol's batch was rolled back. */
export class SinkWriteError extends IndisyncError {
	readonly code = "SINK_WRITE_FAILED" as const;

	constructor(
		public readonly ticker: string,
		cause?: unknown
	) {
		super(
			`Failed to persist indicators for ${ticker}: ${getErrorMessage(cause)}`,
			cause
		);
	}
}

export class ConfigError extends IndisyncError {
	readonly code = "CONFIG_INVALID" as const;
}

export function isIndisyncError(error: unknown): error is IndisyncError {
	return error instanceof IndisyncError;
}

export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

export function getErrorCode(error: unknown): string {
	return isIndisyncError(error) ? error.code : "UNKNOWN_ERROR";
}
