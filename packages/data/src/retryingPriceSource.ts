import {
	createLogger,
	getErrorCode,
	getErrorMessage,
	type IsoDate,
	type ModuleLogger,
	type PricePoint,
} from "@indisync/core";
import type { PriceSource } from "./types";

export interface RetryPolicy {
	maxRetries: number;
	retryDelayMs: number;
	maxRetryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxRetries: 3,
	retryDelayMs: 1000,
	maxRetryDelayMs: 10000,
};

export interface RetryingPriceSourceOptions extends Partial<RetryPolicy> {
	sleep?: (ms: number) => Promise<void>;
	/** Jitter source in [0, 1) */
	random?: () => number;
	logger?: ModuleLogger;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

/** Full-jitter exponential backoff, capped at `maxRetryDelayMs`. */
export const backoffDelay = (
	attempt: number,
	policy: RetryPolicy,
	random: () => number = Math.random
): number => {
	const baseDelay = policy.retryDelayMs * 2 ** attempt;
	const cappedDelay = Math.min(baseDelay, policy.maxRetryDelayMs);
	return random() * cappedDelay;
};

/**
 * Retries a failing fetch with backoff. Exhausted retries yield an empty
 * history so the caller reports the symbol as having no data.
 */
export class RetryingPriceSource implements PriceSource {
	private readonly policy: RetryPolicy;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly random: () => number;
	private readonly logger: ModuleLogger;

	constructor(
		private readonly inner: PriceSource,
		options: RetryingPriceSourceOptions = {}
	) {
		this.policy = {
			maxRetries: Math.max(options.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries, 0),
			retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_POLICY.retryDelayMs,
			maxRetryDelayMs:
				options.maxRetryDelayMs ?? DEFAULT_RETRY_POLICY.maxRetryDelayMs,
		};
		this.sleep = options.sleep ?? defaultSleep;
		this.random = options.random ?? Math.random;
		this.logger = options.logger ?? createLogger("data:retry");
	}

	async fetch(symbol: string, fromDate?: IsoDate): Promise<PricePoint[]> {
		let lastError: unknown;

		for (let attempt = 0; attempt <= this.policy.maxRetries; attempt += 1) {
			try {
				return await this.inner.fetch(symbol, fromDate);
			} catch (error) {
				lastError = error;
				if (attempt < this.policy.maxRetries) {
					const delayMs = backoffDelay(attempt, this.policy, this.random);
					this.logger.warn("price_fetch_retry", {
						symbol,
						attempt: attempt + 1,
						maxRetries: this.policy.maxRetries,
						delayMs,
						error: getErrorMessage(error),
					});
					await this.sleep(delayMs);
				}
			}
		}

		this.logger.error("price_fetch_exhausted", {
			symbol,
			attempts: this.policy.maxRetries + 1,
			code: getErrorCode(lastError),
			error: getErrorMessage(lastError),
		});
		return [];
	}
}
