const SEPARATOR_PATTERN = /[/_:\-.]/;

const JPY_PIP = 0.01;
const DEFAULT_PIP = 0.0001;

const splitSymbol = (symbol: string): [string, string] | null => {
	const trimmed = symbol.trim().toUpperCase();
	if (SEPARATOR_PATTERN.test(trimmed)) {
		const [base, quote] = trimmed.split(SEPARATOR_PATTERN);
		return base && quote ? [base, quote] : null;
	}
	if (trimmed.length === 6) {
		return [trimmed.slice(0, 3), trimmed.slice(3)];
	}
	return null;
};

/**
 * Quote currency of a pair. Accepts "EURUSD", "EUR/USD" and "EUR_USD";
 * returns null when the symbol is not a recognisable pair.
 */
export const quoteCurrency = (symbol: string): string | null =>
	splitSymbol(symbol)?.[1] ?? null;

export const pipSize = (symbol: string): number =>
	quoteCurrency(symbol) === "JPY" ? JPY_PIP : DEFAULT_PIP;

export const toMarketSymbol = (symbol: string): string => {
	const parts = splitSymbol(symbol);
	return parts ? `${parts[0]}/${parts[1]}` : symbol.trim().toUpperCase();
};

export const toPlainSymbol = (symbol: string): string => {
	const parts = splitSymbol(symbol);
	return parts ? `${parts[0]}${parts[1]}` : symbol.trim().toUpperCase();
};
