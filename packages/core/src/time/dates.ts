/**
 * Pure calendar-date utilities for daily series.
 * Dates are `YYYY-MM-DD` strings interpreted at UTC midnight (no timezone conversion).
 */

import { DAY_MS } from "./constants";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isIsoDate = (value: string): boolean => {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		return false;
	}
	const [, year, month, day] = match;
	const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
	return formatIsoDate(ms) === value;
};

/**
 * Parse an ISO calendar date to UTC epoch milliseconds
 * @throws Error if the value is not a real `YYYY-MM-DD` date
 */
export const parseIsoDate = (value: string): number => {
	if (typeof value !== "string" || !isIsoDate(value.trim())) {
		throw new Error(
			`Invalid date: "${String(value)}". Expected format like "2024-01-31"`
		);
	}
	const [year, month, day] = value.trim().split("-").map(Number);
	return Date.UTC(year, month - 1, day);
};

/**
 * Format UTC epoch milliseconds as an ISO calendar date
 * @example formatIsoDate(1704067200000) => "2024-01-01"
 */
export const formatIsoDate = (ms: number): string => {
	if (!Number.isFinite(ms)) {
		throw new Error(`Invalid timestamp: ${ms}`);
	}
	return new Date(ms).toISOString().slice(0, 10);
};

/** Truncate a timestamp to the calendar date (UTC) it falls on. */
export const timestampToIsoDate = (ms: number): string =>
	formatIsoDate(Math.floor(ms / DAY_MS) * DAY_MS);

export const addDays = (date: string, days: number): string => {
	if (!Number.isInteger(days)) {
		throw new Error(`Day offset must be an integer, got ${days}`);
	}
	return formatIsoDate(parseIsoDate(date) + days * DAY_MS);
};

export const compareIsoDates = (a: string, b: string): number =>
	a < b ? -1 : a > b ? 1 : 0;

export const todayIsoDate = (now: Date = new Date()): string =>
	timestampToIsoDate(now.getTime());
