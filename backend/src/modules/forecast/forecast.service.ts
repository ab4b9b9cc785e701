/**
 * FORECAST ADAPTER
 * ================
 *
 * 1. Lag-1 dataset: rows t = 1..n-1, X = [close_{t-1}], y = close_t
 * 2. 80/20 split by index order
 * 3. Fit the configured regression model on the train partition
 * 4. Hold-out MAE/RMSE on the test partition
 * 5. Roll forward forecastDays steps (see ForecastMode)
 */

import { FitError, InsufficientHistoryError, ValidationError } from '../../common/errors.js';
import { closes, lastBar } from '../market-data/price-series.js';
import type { PriceSeries } from '../market-data/market-data.types.js';
import { REGRESSION_MODELS, type IRegressionModel, type RegressionModelFactory, type RegressionModelKey } from './models/index.js';
import type {
  ForecastConfig,
  ForecastEvaluation,
  ForecastMode,
  ForecastResult,
  LagDataset,
} from './forecast.types.js';
import { nextWeekdays } from './trading-calendar.js';

export const TRAIN_FRACTION = 0.8;
export const MIN_TRAINING_ROWS = 5;
export const MIN_FORECAST_DAYS = 1;
export const MAX_FORECAST_DAYS = 365;

export const DEFAULT_FORECAST_CONFIG: ForecastConfig = {
  forecastDays: 30,
  model: 'boosted-trees',
  mode: 'repeat-last-lag',
};

// ═══════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════

export function buildLagDataset(prices: number[]): LagDataset {
  const X: number[][] = [];
  const y: number[] = [];
  for (let t = 1; t < prices.length; t++) {
    X.push([prices[t - 1]]);
    y.push(prices[t]);
  }
  return { X, y };
}

export function splitByIndex(dataset: LagDataset, fraction = TRAIN_FRACTION): { train: LagDataset; test: LagDataset } {
  const trainSize = Math.floor(dataset.y.length * fraction);
  return {
    train: { X: dataset.X.slice(0, trainSize), y: dataset.y.slice(0, trainSize) },
    test: { X: dataset.X.slice(trainSize), y: dataset.y.slice(trainSize) },
  };
}

// ═══════════════════════════════════════════════════════════════
// MODEL HELPERS
// ═══════════════════════════════════════════════════════════════

function predictChecked(model: IRegressionModel, x: number[]): number {
  const value = model.predictOne(x);
  if (!Number.isFinite(value)) {
    throw new FitError(model.key, `non-finite prediction for input ${x.join(',')}`);
  }
  return value;
}

function fitChecked(model: IRegressionModel, train: LagDataset): void {
  try {
    model.fit(train.X, train.y);
  } catch (error) {
    throw new FitError(model.key, error);
  }
}

export function evaluateHoldout(model: IRegressionModel, train: LagDataset, test: LagDataset): ForecastEvaluation {
  if (test.y.length === 0) {
    return { trainRows: train.y.length, testRows: 0, mae: null, rmse: null };
  }

  let abs = 0;
  let sq = 0;
  for (let i = 0; i < test.y.length; i++) {
    const err = predictChecked(model, test.X[i]) - test.y[i];
    abs += Math.abs(err);
    sq += err * err;
  }

  return {
    trainRows: train.y.length,
    testRows: test.y.length,
    mae: abs / test.y.length,
    rmse: Math.sqrt(sq / test.y.length),
  };
}

export function rollForward(model: IRegressionModel, prices: number[], days: number, mode: ForecastMode): number[] {
  const out: number[] = [];

  switch (mode) {
    case 'repeat-last-lag': {
      // lag feature of the last row, i.e. the second-to-last close
      const lastLag = prices[prices.length - 2];
      for (let step = 0; step < days; step++) {
        out.push(predictChecked(model, [lastLag]));
      }
      return out;
    }
    case 'iterative': {
      let lag = prices[prices.length - 1];
      for (let step = 0; step < days; step++) {
        lag = predictChecked(model, [lag]);
        out.push(lag);
      }
      return out;
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class ForecastService {
  constructor(
    private readonly defaults: ForecastConfig = DEFAULT_FORECAST_CONFIG,
    private readonly models: Readonly<Record<RegressionModelKey, RegressionModelFactory>> = REGRESSION_MODELS,
  ) {}

  forecast(series: PriceSeries, overrides: Partial<ForecastConfig> = {}): ForecastResult {
    const config: ForecastConfig = { ...this.defaults, ...overrides };
    const { forecastDays } = config;

    if (!Number.isInteger(forecastDays) || forecastDays < MIN_FORECAST_DAYS || forecastDays > MAX_FORECAST_DAYS) {
      throw new ValidationError(
        `forecastDays must be an integer between ${MIN_FORECAST_DAYS} and ${MAX_FORECAST_DAYS}`,
      );
    }

    const prices = closes(series);
    const { train, test } = splitByIndex(buildLagDataset(prices));
    const last = lastBar(series);

    if (!last || train.y.length < MIN_TRAINING_ROWS) {
      throw new InsufficientHistoryError(`forecast training rows of ${series.symbol}`, MIN_TRAINING_ROWS, train.y.length);
    }

    const model = this.models[config.model]();
    fitChecked(model, train);

    const evaluation = evaluateHoldout(model, train, test);
    const values = rollForward(model, prices, forecastDays, config.mode);
    const dates = nextWeekdays(last.date, forecastDays);

    return {
      symbol: series.symbol,
      model: config.model,
      mode: config.mode,
      horizonDays: forecastDays,
      lastObservedDate: last.date,
      lastClose: last.close,
      steps: values.map((value, i) => ({ offset: i + 1, date: dates[i], value })),
      pointForecast: values[values.length - 1],
      evaluation,
    };
  }
}
