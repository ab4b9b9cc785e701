/**
 * FORECAST TYPES
 * ==============
 *
 * Lag-1 regression forecasts over daily closes.
 *
 * Modes:
 * - repeat-last-lag: every step evaluates the model on the same last lag
 *   value (close[n-2]), so a deterministic model repeats one number N times.
 *   Kept for compatibility with the dashboard's historical output.
 * - iterative: starts from the last close and feeds each prediction back
 *   in as the next step's lag.
 */

import type { RegressionModelKey } from './models/regression.types.js';

export type ForecastMode = 'repeat-last-lag' | 'iterative';

export const FORECAST_MODES = ['repeat-last-lag', 'iterative'] as const satisfies readonly ForecastMode[];

export interface ForecastConfig {
  forecastDays: number;
  model: RegressionModelKey;
  mode: ForecastMode;
}

export interface LagDataset {
  X: number[][];   // [close_{t-1}]
  y: number[];     // close_t
}

export interface ForecastStep {
  offset: number;  // trading days after the last observed date
  date: string;    // YYYY-MM-DD, weekdays only
  value: number;
}

export interface ForecastEvaluation {
  trainRows: number;
  testRows: number;
  mae: number | null;
  rmse: number | null;
}

export interface ForecastResult {
  symbol: string;
  model: RegressionModelKey;
  mode: ForecastMode;
  horizonDays: number;
  lastObservedDate: string;
  lastClose: number;
  steps: ForecastStep[];
  /** value of the final step; the single price consumed downstream */
  pointForecast: number;
  evaluation: ForecastEvaluation;
}
