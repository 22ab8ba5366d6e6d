/**
 * Exponential moving average seeded with the first observation (no SMA seed),
 * so every index of a non-empty window carries a value.
 */
export function emaSeries(values: readonly number[], length: number): number[] {
	if (length <= 0) {
		throw new Error(`EMA length must be positive, got ${length}`);
	}
	if (values.length === 0) {
		return [];
	}

	const multiplier = 2 / (length + 1);
	let emaValue = values[0];
	const series: number[] = [emaValue];

	for (let i = 1; i < values.length; i += 1) {
		emaValue = multiplier * values[i] + (1 - multiplier) * emaValue;
		series.push(emaValue);
	}

	return series;
}
