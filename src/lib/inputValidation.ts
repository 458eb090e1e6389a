const VALID_SYMBOL_PATTERN = /^[A-Z0-9][A-Z0-9&^.\-]*$/;
const MAX_SYMBOL_LENGTH = 20;

// Indian exchange suffixes recognised as already qualified
const KNOWN_EXCHANGE_SUFFIXES = ['.NS', '.BO'];

export function validateSymbol(input: string): { valid: boolean; error?: string } {
  const symbol = input.trim().toUpperCase();
  if (!symbol) return { valid: false, error: 'Please enter a stock symbol' };
  if (symbol.length > MAX_SYMBOL_LENGTH) return { valid: false, error: 'Symbol too long' };
  if (!VALID_SYMBOL_PATTERN.test(symbol)) {
    return { valid: false, error: 'Symbol contains invalid characters' };
  }
  return { valid: true };
}

/**
 * Upper-cases the symbol and qualifies bare tickers with the default exchange
 * suffix (`RELIANCE` -> `RELIANCE.NS`). An empty suffix leaves tickers bare.
 */
export function normalizeSymbol(input: string, defaultSuffix: string = '.NS'): string {
  const symbol = input.trim().toUpperCase();
  const suffix = defaultSuffix.trim().toUpperCase();
  if (!suffix) return symbol;

  const qualified = [...KNOWN_EXCHANGE_SUFFIXES, suffix].some((known) => symbol.endsWith(known));
  return qualified ? symbol : `${symbol}${suffix}`;
}
