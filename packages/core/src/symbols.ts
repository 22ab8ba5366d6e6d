export const DEFAULT_MARKET_SUFFIXES: readonly string[] = [".NS", ".BO"];

const collapseWhitespace = (symbol: string): string =>
	symbol.replace(/\s+/g, "");

/**
 * Strip exchange decoration (e.g. `RELIANCE.NS` -> `RELIANCE`) so the
 * result can be used as a store key.
 */
export const normalizeTicker = (
	symbol: string,
	suffixes: readonly string[] = DEFAULT_MARKET_SUFFIXES
): string => {
	const trimmed = collapseWhitespace(symbol).toUpperCase();
	if (!trimmed) {
		return trimmed;
	}
	for (const suffix of suffixes) {
		const tag = suffix.toUpperCase();
		if (tag && trimmed.endsWith(tag) && trimmed.length > tag.length) {
			return trimmed.slice(0, -tag.length);
		}
	}
	return trimmed;
};

export const toSourceSymbol = (ticker: string, suffix: string): string => {
	const trimmed = collapseWhitespace(ticker).toUpperCase();
	if (!suffix || trimmed.endsWith(suffix.toUpperCase())) {
		return trimmed;
	}
	return `${trimmed}${suffix.toUpperCase()}`;
};
