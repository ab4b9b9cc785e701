import { describe, it, expect } from 'vitest';
import { backtest, compound, computeReturns, simpleReturns } from '../returns.service.js';
import { InsufficientHistoryError } from '../../../common/errors.js';
import { SCENARIO_CLOSES, makeSeries } from '../../../common/__tests__/fixtures.js';

describe('Return/Risk Calculator', () => {
  it('computes simple per-bar returns with a null first entry', () => {
    const summary = computeReturns(makeSeries([100, 110, 99]));

    expect(summary.returns[0]).toBeNull();
    expect(summary.returns[1]).toBeCloseTo(0.1, 12);
    expect(summary.returns[2]).toBeCloseTo(-0.1, 12);
    expect(summary.cumulativeReturn).toBeCloseTo(-0.01, 12);
    expect(summary.volatility).toBeCloseTo(Math.sqrt(0.02), 12);
  });

  it('reconstructs the final close from the initial close and cumulative return', () => {
    const summary = computeReturns(makeSeries(SCENARIO_CLOSES));
    const first = SCENARIO_CLOSES[0];
    const last = SCENARIO_CLOSES[SCENARIO_CLOSES.length - 1];

    expect(first * (1 + summary.cumulativeReturn)).toBeCloseTo(last, 9);
    expect(summary.cumulativeReturn).toBeCloseTo(0.12, 9);
  });

  it('compounds explicit returns', () => {
    expect(compound([null, 0.1, 0.1])).toBeCloseTo(0.21, 12);
    expect(simpleReturns([50, 100])).toEqual([null, 1]);
  });

  it('reports null volatility when only one return exists', () => {
    const summary = computeReturns(makeSeries([100, 105]));
    expect(summary.cumulativeReturn).toBeCloseTo(0.05, 12);
    expect(summary.volatility).toBeNull();
  });

  it('fails with insufficient history on a single bar', () => {
    expect(() => computeReturns(makeSeries([100]))).toThrow(InsufficientHistoryError);
    expect(() => computeReturns(makeSeries([100]))).toThrow('Insufficient data for returns of TEST: need 2, have 1');
  });

  it('backtest reports the total buy-and-hold return per symbol', () => {
    const result = backtest(makeSeries([200, 150, 300], { symbol: 'TCS.NS' }));
    expect(result.symbol).toBe('TCS.NS');
    expect(result.totalReturn).toBeCloseTo(0.5, 12);
  });
});
