import { finiteOrNull, smaSeries } from "./sma";

/** Volume relative to its rolling mean; null until the mean exists or when it is zero. */
export function volumeSurgeSeries(
	volumes: readonly number[],
	period = 20
): Array<number | null> {
	const means = smaSeries(volumes, period);
	return means.map((mean, i) =>
		mean === null ? null : finiteOrNull(volumes[i] / mean)
	);
}
