/**
 * Symbol resolution for free-text queries.
 */

export const DEFAULT_SYMBOLS: readonly string[] = ["TSM", "005930.KS"];

/** Lowercase company alias -> ticker. Longer aliases first. */
const COMPANY_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["taiwan semiconductor", "TSM"],
  ["samsung electronics", "005930.KS"],
  ["advanced micro devices", "AMD"],
  ["tsmc", "TSM"],
  ["samsung", "005930.KS"],
  ["apple", "AAPL"],
  ["google", "GOOGL"],
  ["alphabet", "GOOGL"],
  ["microsoft", "MSFT"],
  ["amazon", "AMZN"],
  ["meta", "META"],
  ["facebook", "META"],
  ["netflix", "NFLX"],
  ["nvidia", "NVDA"],
  ["tesla", "TSLA"],
  ["intel", "INTC"],
  ["amd", "AMD"],
  ["qualcomm", "QCOM"],
];

const TICKER_PATTERN = /\b[A-Z]{1,5}\b/g;

/**
 * Uppercase 1-5 letter words are taken as tickers as written; known company
 * names map to their ticker. Order of first appearance is kept, duplicates
 * removed. Falls back to DEFAULT_SYMBOLS when nothing is found.
 */
export function extractSymbols(query: string): string[] {
  const found: string[] = [...(query.match(TICKER_PATTERN) ?? [])];

  const lowered = query.toLowerCase();
  for (const [alias, symbol] of COMPANY_ALIASES) {
    if (lowered.includes(alias)) found.push(symbol);
  }

  const unique = dedupe(found);
  return unique.length > 0 ? unique : [...DEFAULT_SYMBOLS];
}

/** Parses an explicit "TSM, AAPL" list. */
export function parseSymbolList(csv: string): string[] {
  return dedupe(
    csv
      .split(",")
      .map(s => s.trim())
      .filter(s => s.length > 0)
  );
}

/**
 * Explicit symbols win over the ones found in the query.
 */
export function resolveSymbols(query: string, explicit?: string): string[] {
  if (explicit !== undefined) {
    const parsed = parseSymbolList(explicit);
    if (parsed.length > 0) return parsed;
  }
  return extractSymbols(query);
}

/** Display name for a ticker, e.g. "005930.KS" -> "Samsung Electronics". */
export function companyNameFor(symbol: string): string {
  const alias = COMPANY_ALIASES.find(([, s]) => s === symbol)?.[0];
  if (!alias) return symbol;
  return alias.replace(/\b[a-z]/g, ch => ch.toUpperCase());
}

function dedupe(values: string[]): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const v of values) {
    if (seen.has(v)) continue;
    seen.add(v);
    ordered.push(v);
  }
  return ordered;
}
