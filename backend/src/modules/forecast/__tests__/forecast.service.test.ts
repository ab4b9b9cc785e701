import { describe, it, expect } from 'vitest';
import {
  ForecastService,
  buildLagDataset,
  splitByIndex,
  DEFAULT_FORECAST_CONFIG,
} from '../forecast.service.js';
import { nextWeekdays } from '../trading-calendar.js';
import { REGRESSION_MODELS, type IRegressionModel } from '../models/index.js';
import { FitError, InsufficientHistoryError, ValidationError } from '../../../common/errors.js';
import { SCENARIO_CLOSES, makeSeries } from '../../../common/__tests__/fixtures.js';

const linearCloses = Array.from({ length: 10 }, (_, i) => 100 + i);

describe('Forecast Adapter', () => {
  describe('dataset', () => {
    it('pairs each close with the previous close', () => {
      const ds = buildLagDataset([10, 11, 13]);
      expect(ds.X).toEqual([[10], [11]]);
      expect(ds.y).toEqual([11, 13]);
    });

    it('splits 80/20 by index order', () => {
      const { train, test } = splitByIndex(buildLagDataset(SCENARIO_CLOSES));
      expect(train.y).toEqual([102, 101, 105, 103, 108, 110, 107]);
      expect(test.y).toEqual([109, 112]);
    });
  });

  describe('repeat-last-lag mode', () => {
    it('returns forecastDays identical values', () => {
      const service = new ForecastService();
      const result = service.forecast(makeSeries(SCENARIO_CLOSES), { forecastDays: 7 });

      expect(result.steps).toHaveLength(7);
      expect(new Set(result.steps.map((s) => s.value)).size).toBe(1);
      expect(result.pointForecast).toBe(result.steps[6].value);
      expect(result.mode).toBe('repeat-last-lag');
      expect(result.model).toBe('boosted-trees');
    });

    it('evaluates the model on the second-to-last close', () => {
      const service = new ForecastService({ ...DEFAULT_FORECAST_CONFIG, model: 'linear' });
      const result = service.forecast(makeSeries(linearCloses), { forecastDays: 3 });

      // y = x + 1, last lag = close[8] = 108
      for (const step of result.steps) {
        expect(step.value).toBeCloseTo(109, 9);
      }
    });
  });

  describe('iterative mode', () => {
    it('feeds each prediction back as the next lag', () => {
      const service = new ForecastService({ ...DEFAULT_FORECAST_CONFIG, model: 'linear', mode: 'iterative' });
      const result = service.forecast(makeSeries(linearCloses), { forecastDays: 3 });

      expect(result.steps.map((s) => s.value)).toHaveLength(3);
      expect(result.steps[0].value).toBeCloseTo(110, 9);
      expect(result.steps[1].value).toBeCloseTo(111, 9);
      expect(result.steps[2].value).toBeCloseTo(112, 9);
      expect(result.pointForecast).toBeCloseTo(112, 9);
    });
  });

  it('dates steps on the weekdays after the last bar', () => {
    const series = makeSeries(linearCloses);
    const result = new ForecastService().forecast(series, { forecastDays: 3 });

    expect(result.lastObservedDate).toBe('2024-01-12');
    expect(result.lastClose).toBe(109);
    expect(result.steps.map((s) => [s.offset, s.date])).toEqual([
      [1, '2024-01-15'],
      [2, '2024-01-16'],
      [3, '2024-01-17'],
    ]);
  });

  it('scores the hold-out partition', () => {
    const service = new ForecastService({ ...DEFAULT_FORECAST_CONFIG, model: 'linear' });
    const { evaluation } = service.forecast(makeSeries(linearCloses), { forecastDays: 1 });

    expect(evaluation.trainRows).toBe(7);
    expect(evaluation.testRows).toBe(2);
    expect(evaluation.mae).toBeCloseTo(0, 9);
    expect(evaluation.rmse).toBeCloseTo(0, 9);
  });

  describe('errors', () => {
    it('fails with insufficient history on a single bar', () => {
      expect(() => new ForecastService().forecast(makeSeries([100]))).toThrow(InsufficientHistoryError);
    });

    it('needs at least 5 training rows', () => {
      const service = new ForecastService();
      // 6 bars -> 5 lag rows -> 4 training rows
      expect(() => service.forecast(makeSeries([1, 2, 3, 4, 5, 6]))).toThrow(InsufficientHistoryError);
      // 8 bars -> 7 lag rows -> 5 training rows
      expect(service.forecast(makeSeries([1, 2, 3, 4, 5, 6, 7, 8]), { forecastDays: 2 }).steps).toHaveLength(2);
    });

    it('wraps model failures in FitError', () => {
      const service = new ForecastService({ ...DEFAULT_FORECAST_CONFIG, model: 'linear' });
      expect(() => service.forecast(makeSeries(new Array(10).fill(100)))).toThrow(FitError);
      expect(() => service.forecast(makeSeries(new Array(10).fill(100)))).toThrow(
        'Model linear failed to fit: feature has zero variance',
      );
    });

    it('reports non-finite predictions as FitError', () => {
      const broken: IRegressionModel = {
        key: 'linear',
        fit: () => undefined,
        predictOne: () => Number.NaN,
      };
      const service = new ForecastService(DEFAULT_FORECAST_CONFIG, {
        ...REGRESSION_MODELS,
        'boosted-trees': () => broken,
      });
      expect(() => service.forecast(makeSeries(SCENARIO_CLOSES))).toThrow(FitError);
    });

    it('validates forecastDays', () => {
      const service = new ForecastService();
      expect(() => service.forecast(makeSeries(SCENARIO_CLOSES), { forecastDays: 0 })).toThrow(ValidationError);
      expect(() => service.forecast(makeSeries(SCENARIO_CLOSES), { forecastDays: 366 })).toThrow(ValidationError);
    });
  });
});

describe('nextWeekdays', () => {
  it('skips weekends', () => {
    expect(nextWeekdays('2024-01-12', 3)).toEqual(['2024-01-15', '2024-01-16', '2024-01-17']);
    expect(nextWeekdays('2024-01-10', 2)).toEqual(['2024-01-11', '2024-01-12']);
  });
});
