import { ValidationError } from '../../common/errors.js';
import { MARKET_SUFFIX, type DateRange, type Market } from './market-data.types.js';

/**
 * "reliance, tcs" + IN -> ["RELIANCE.NS", "TCS.NS"]
 * Symbols that already carry an exchange suffix are left alone.
 */
export function resolveSymbols(input: string, market: Market): string[] {
  const suffix = MARKET_SUFFIX[market];
  const out: string[] = [];

  for (const raw of input.split(',')) {
    const symbol = raw.trim().toUpperCase();
    if (!symbol) continue;
    const resolved = suffix && !symbol.includes('.') ? `${symbol}${suffix}` : symbol;
    if (!out.includes(resolved)) out.push(resolved);
  }

  return out;
}

export const MIN_LOOKBACK_YEARS = 1;
export const MAX_LOOKBACK_YEARS = 10;

export function lookbackRange(years: number, today: Date = new Date()): DateRange {
  if (!Number.isInteger(years) || years < MIN_LOOKBACK_YEARS || years > MAX_LOOKBACK_YEARS) {
    throw new ValidationError(
      `years must be an integer between ${MIN_LOOKBACK_YEARS} and ${MAX_LOOKBACK_YEARS}`,
    );
  }
  const end = today.toISOString().slice(0, 10);
  const startDate = new Date(Date.UTC(today.getUTCFullYear() - years, today.getUTCMonth(), today.getUTCDate()));
  return { start: startDate.toISOString().slice(0, 10), end };
}
