import { finiteOrNull, smaSeries } from "./sma";

/**
 * RSI over plain rolling means of gains and losses (not Wilder smoothing).
 * The first close has no change, so the first `period` values are null.
 */
export function rsiSeries(
	values: readonly number[],
	period = 14
): Array<number | null> {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	const gains: Array<number | null> = values.map((value, i) =>
		i === 0 ? null : Math.max(value - values[i - 1], 0)
	);
	const losses: Array<number | null> = values.map((value, i) =>
		i === 0 ? null : Math.max(values[i - 1] - value, 0)
	);

	const avgGains = smaSeries(gains, period);
	const avgLosses = smaSeries(losses, period);

	return avgGains.map((avgGain, i) => {
		const avgLoss = avgLosses[i];
		if (avgGain === null || avgLoss === null) {
			return null;
		}
		// avgLoss === 0 gives rs = Infinity and therefore exactly 100; 0/0 is undefined.
		const rs = avgGain / avgLoss;
		return finiteOrNull(100 - 100 / (1 + rs));
	});
}
