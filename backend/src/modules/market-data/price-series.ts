/**
 * PRICE SERIES
 * ============
 *
 * Construction and read helpers for PriceSeries. Every downstream
 * computation reads bars through here.
 */

import { ValidationError } from '../../common/errors.js';
import type { DateRange, PriceBar, PriceSeries } from './market-data.types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function assertBar(bar: PriceBar, index: number): void {
  if (!isIsoDate(bar.date)) {
    throw new ValidationError(`Bar ${index}: invalid date "${bar.date}"`);
  }
  for (const field of ['open', 'high', 'low', 'close'] as const) {
    const value = bar[field];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(`Bar ${index} (${bar.date}): ${field} must be positive, got ${value}`);
    }
  }
  if (!Number.isInteger(bar.volume) || bar.volume < 0) {
    throw new ValidationError(`Bar ${index} (${bar.date}): volume must be a non-negative integer, got ${bar.volume}`);
  }
}

/**
 * Validates ordering and values, then freezes the result.
 * Bars must already be sorted by date ascending with no duplicate dates.
 */
export function createPriceSeries(symbol: string, range: DateRange, bars: PriceBar[]): PriceSeries {
  const frozen: Readonly<PriceBar>[] = [];

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    assertBar(bar, i);
    if (i > 0 && bar.date <= bars[i - 1].date) {
      throw new ValidationError(
        `Bars must be strictly increasing by date: ${bars[i - 1].date} followed by ${bar.date}`,
      );
    }
    frozen.push(Object.freeze({ ...bar }));
  }

  return Object.freeze({
    symbol,
    range: Object.freeze({ ...range }),
    bars: Object.freeze(frozen),
  });
}

export function closes(series: PriceSeries): number[] {
  return series.bars.map((bar) => bar.close);
}

export function volumes(series: PriceSeries): number[] {
  return series.bars.map((bar) => bar.volume);
}

export function lastBar(series: PriceSeries): Readonly<PriceBar> | undefined {
  return series.bars[series.bars.length - 1];
}
