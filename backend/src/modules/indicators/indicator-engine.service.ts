/**
 * INDICATOR ENGINE SERVICE
 * ========================
 *
 * Maps a tagged selector to its computation. Adding a selector variant
 * without a case below fails to compile.
 */

import { ValidationError } from '../../common/errors.js';
import { closes, volumes } from '../market-data/price-series.js';
import type { PriceSeries } from '../market-data/market-data.types.js';
import {
  INDICATOR_CATALOG,
  type IndicatorComputation,
  type IndicatorId,
  type IndicatorResult,
  type IndicatorSelector,
} from './indicator.types.js';
import { cumulativeVwap, exponentialMean, rollingMean, rollingSampleStd } from './indicator.math.js';

function assertPositiveInt(name: string, value: number, min = 1): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

function assertNever(value: never): never {
  throw new ValidationError(`Unknown indicator selector: ${JSON.stringify(value)}`);
}

export function selectorKey(selector: IndicatorSelector): string {
  switch (selector.kind) {
    case 'SMA':
      return `sma_${selector.window}`;
    case 'EMA':
      return `ema_${selector.span}`;
    case 'BOLLINGER':
      return `bb_${selector.window}_${selector.k}`;
    case 'VWAP':
      return 'vwap';
    default:
      return assertNever(selector);
  }
}

export function selectorLabel(selector: IndicatorSelector): string {
  switch (selector.kind) {
    case 'SMA':
      return `SMA ${selector.window}`;
    case 'EMA':
      return `EMA ${selector.span}`;
    case 'BOLLINGER':
      return `Bollinger ${selector.window}, ${selector.k}σ`;
    case 'VWAP':
      return 'VWAP';
    default:
      return assertNever(selector);
  }
}

function line(selector: IndicatorSelector, values: (number | null)[]): IndicatorComputation {
  return {
    shape: 'line',
    selector,
    result: { key: selectorKey(selector), label: selectorLabel(selector), values },
  };
}

function bollinger(
  selector: Extract<IndicatorSelector, { kind: 'BOLLINGER' }>,
  prices: number[],
): IndicatorComputation {
  const { window, k } = selector;
  const middle = rollingMean(prices, window);
  const sigma = rollingSampleStd(prices, window);
  const upper: (number | null)[] = [];
  const lower: (number | null)[] = [];

  for (let t = 0; t < prices.length; t++) {
    const m = middle[t];
    const s = sigma[t];
    upper.push(m !== null && s !== null ? m + k * s : null);
    lower.push(m !== null && s !== null ? m - k * s : null);
  }

  const key = selectorKey(selector);
  const label = selectorLabel(selector);
  const band = (part: string, values: (number | null)[]): IndicatorResult => ({
    key: `${key}_${part}`,
    label: `${label} ${part}`,
    values,
  });

  return {
    shape: 'band',
    selector,
    upper: band('upper', upper),
    middle: band('middle', middle),
    lower: band('lower', lower),
  };
}

export function computeIndicator(series: PriceSeries, selector: IndicatorSelector): IndicatorComputation {
  const prices = closes(series);

  switch (selector.kind) {
    case 'SMA':
      assertPositiveInt('SMA window', selector.window);
      return line(selector, rollingMean(prices, selector.window));
    case 'EMA':
      assertPositiveInt('EMA span', selector.span);
      return line(selector, exponentialMean(prices, selector.span));
    case 'BOLLINGER':
      assertPositiveInt('Bollinger window', selector.window, 2);
      if (!Number.isFinite(selector.k) || selector.k <= 0) {
        throw new ValidationError(`Bollinger k must be positive, got ${selector.k}`);
      }
      return bollinger(selector, prices);
    case 'VWAP':
      return line(selector, cumulativeVwap(prices, volumes(series)));
    default:
      return assertNever(selector);
  }
}

export function computeCatalogIndicators(
  series: PriceSeries,
  ids: readonly IndicatorId[],
): IndicatorComputation[] {
  return ids.map((id) => computeIndicator(series, INDICATOR_CATALOG[id]));
}

/**
 * Flattens band computations into their three lines.
 */
export function indicatorLines(computation: IndicatorComputation): IndicatorResult[] {
  return computation.shape === 'line'
    ? [computation.result]
    : [computation.upper, computation.middle, computation.lower];
}
