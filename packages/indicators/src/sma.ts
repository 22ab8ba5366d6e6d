/**
 * Simple moving average aligned to its input. A window yields a value only
 * once it holds `period` defined entries; the sum is taken left to right so
 * identical windows always produce identical means.
 */
export function smaSeries(
	values: ReadonlyArray<number | null>,
	period: number
): Array<number | null> {
	if (period <= 0 || !Number.isInteger(period)) {
		throw new Error(`SMA period must be a positive integer, got ${period}`);
	}

	const series: Array<number | null> = new Array(values.length).fill(null);

	for (let i = period - 1; i < values.length; i += 1) {
		let sum = 0;
		let complete = true;
		for (let j = i - period + 1; j <= i; j += 1) {
			const value = values[j];
			if (value === null) {
				complete = false;
				break;
			}
			sum += value;
		}
		if (complete) {
			series[i] = sum / period;
		}
	}

	return series;
}

export const finiteOrNull = (value: number): number | null =>
	Number.isFinite(value) ? value : null;
