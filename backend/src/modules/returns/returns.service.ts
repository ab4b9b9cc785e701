/**
 * RETURN / RISK CALCULATOR
 * ========================
 *
 * Simple per-bar returns, compounded total return and return volatility.
 */

import { InsufficientHistoryError } from '../../common/errors.js';
import { closes } from '../market-data/price-series.js';
import type { PriceSeries } from '../market-data/market-data.types.js';
import { sampleStd } from '../indicators/indicator.math.js';
import type { BacktestResult, ReturnsSummary } from './returns.types.js';

export const MIN_RETURN_BARS = 2;

export function simpleReturns(prices: number[]): (number | null)[] {
  return prices.map((price, t) => (t === 0 ? null : price / prices[t - 1] - 1));
}

export function compound(returns: readonly (number | null)[]): number {
  let growth = 1;
  for (const r of returns) {
    if (r !== null) growth *= 1 + r;
  }
  return growth - 1;
}

export function computeReturns(series: PriceSeries): ReturnsSummary {
  if (series.bars.length < MIN_RETURN_BARS) {
    throw new InsufficientHistoryError(`returns of ${series.symbol}`, MIN_RETURN_BARS, series.bars.length);
  }

  const returns = simpleReturns(closes(series));
  const defined = returns.filter((r): r is number => r !== null);

  return {
    returns,
    cumulativeReturn: compound(returns),
    volatility: sampleStd(defined),
  };
}

/**
 * Buy-and-hold total return over the whole series.
 */
export function backtest(series: PriceSeries): BacktestResult {
  return {
    symbol: series.symbol,
    totalReturn: computeReturns(series).cumulativeReturn,
  };
}
