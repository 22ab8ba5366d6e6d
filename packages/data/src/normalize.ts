import { compareIsoDates, type PricePoint } from "@indisync/core";

/** Sort ascending by date and keep the last point seen for each date. */
export const normalizePriceSeries = (
	points: readonly PricePoint[]
): PricePoint[] => {
	const byDate = new Map<string, PricePoint>();
	for (const point of points) {
		byDate.set(point.date, point);
	}
	return Array.from(byDate.values()).sort((a, b) =>
		compareIsoDates(a.date, b.date)
	);
};
