import { describe, it, expect } from 'vitest';
import {
  computeIndicator,
  computeCatalogIndicators,
  indicatorLines,
  selectorKey,
} from '../indicator-engine.service.js';
import { sampleStd } from '../indicator.math.js';
import { ValidationError } from '../../../common/errors.js';
import { SCENARIO_CLOSES, makeSeries } from '../../../common/__tests__/fixtures.js';
import type { IndicatorComputation, IndicatorResult } from '../indicator.types.js';

const wave = Array.from({ length: 30 }, (_, i) => 100 + Math.sin(i) * 5 + i * 0.3);

function lineOf(computation: IndicatorComputation): IndicatorResult {
  if (computation.shape !== 'line') throw new Error('expected a line indicator');
  return computation.result;
}

describe('Indicator Engine', () => {
  describe('SMA', () => {
    it('averages the trailing 5 closes of the scenario series', () => {
      const sma = lineOf(computeIndicator(makeSeries(SCENARIO_CLOSES), { kind: 'SMA', window: 5 }));

      expect(sma.values.slice(0, 4)).toEqual([null, null, null, null]);
      expect(sma.values[4]).toBeCloseTo(102.2, 10);
      expect(sma.values[9]).toBeCloseTo((108 + 110 + 107 + 109 + 112) / 5, 10);
      expect(sma.values).toHaveLength(10);
    });

    it('SMA 50 and SMA 200 leave window-1 leading values undefined on a long series', () => {
      const ramp = Array.from({ length: 210 }, (_, i) => 100 + i);
      const [sma50, sma200] = computeCatalogIndicators(makeSeries(ramp), ['SMA_50', 'SMA_200']).map(lineOf);

      expect(sma50.key).toBe('sma_50');
      expect(sma50.values.slice(0, 49).every((v) => v === null)).toBe(true);
      expect(sma50.values[49]).toBeCloseTo(124.5, 9);
      expect(sma50.values[209]).toBeCloseTo(284.5, 9);

      expect(sma200.key).toBe('sma_200');
      expect(sma200.values.slice(0, 199).every((v) => v === null)).toBe(true);
      expect(sma200.values[199]).toBeCloseTo(199.5, 9);
      expect(sma200.values[209]).toBeCloseTo(209.5, 9);
      expect(sma200.values).toHaveLength(210);
    });

    it('SMA 20 is defined from index 19 and equals the mean of close[t-19..t]', () => {
      const sma = lineOf(computeIndicator(makeSeries(wave), { kind: 'SMA', window: 20 }));

      for (let t = 0; t < wave.length; t++) {
        if (t < 19) {
          expect(sma.values[t]).toBeNull();
        } else {
          const slice = wave.slice(t - 19, t + 1);
          expect(sma.values[t]).toBeCloseTo(slice.reduce((s, v) => s + v, 0) / 20, 9);
        }
      }
    });

    it('is null everywhere when the series is shorter than the window', () => {
      const sma = lineOf(computeIndicator(makeSeries(SCENARIO_CLOSES), { kind: 'SMA', window: 200 }));
      expect(sma.values).toEqual(new Array(10).fill(null));
    });

    it('rejects a non-positive window', () => {
      expect(() => computeIndicator(makeSeries(SCENARIO_CLOSES), { kind: 'SMA', window: 0 })).toThrow(ValidationError);
    });
  });

  describe('EMA', () => {
    it('seeds from the first close and applies alpha = 2/(span+1)', () => {
      const ema = lineOf(computeIndicator(makeSeries([10, 20, 30]), { kind: 'EMA', span: 3 }));
      expect(ema.values).toEqual([10, 15, 22.5]);
    });

    it('is defined from the first bar', () => {
      const ema = lineOf(computeIndicator(makeSeries(SCENARIO_CLOSES), { kind: 'EMA', span: 20 }));
      expect(ema.values.every((v) => v !== null)).toBe(true);
      expect(ema.values[0]).toBe(100);
    });
  });

  describe('Bollinger Bands', () => {
    it('uses the sample standard deviation', () => {
      const bands = computeIndicator(makeSeries([1, 2, 3]), { kind: 'BOLLINGER', window: 3, k: 2 });
      if (bands.shape !== 'band') throw new Error('expected band');

      expect(bands.middle.values.slice(0, 2)).toEqual([null, null]);
      expect(bands.middle.values[2]).toBeCloseTo(2, 12);
      expect(bands.upper.values[2]).toBeCloseTo(4, 12);
      expect(bands.lower.values[2]).toBeCloseTo(0, 12);
    });

    it('upper - lower equals 4 sigma wherever defined', () => {
      const bands = computeIndicator(makeSeries(wave), { kind: 'BOLLINGER', window: 20, k: 2 });
      if (bands.shape !== 'band') throw new Error('expected band');

      for (let t = 0; t < wave.length; t++) {
        const upper = bands.upper.values[t];
        const lower = bands.lower.values[t];
        if (t < 19) {
          expect(upper).toBeNull();
          expect(lower).toBeNull();
          continue;
        }
        const sigma = sampleStd(wave.slice(t - 19, t + 1));
        expect(upper).not.toBeNull();
        expect(lower).not.toBeNull();
        expect((upper ?? 0) - (lower ?? 0)).toBeCloseTo(4 * (sigma ?? 0), 9);
      }
    });

    it('requires a window of at least 2', () => {
      expect(() =>
        computeIndicator(makeSeries(SCENARIO_CLOSES), { kind: 'BOLLINGER', window: 1, k: 2 }),
      ).toThrow(ValidationError);
    });
  });

  describe('VWAP', () => {
    it('is cumulative close*volume over cumulative volume', () => {
      const vwap = lineOf(computeIndicator(makeSeries([10, 20, 30], { volumes: [1, 3, 4] }), { kind: 'VWAP' }));
      expect(vwap.values[0]).toBe(10);
      expect(vwap.values[1]).toBeCloseTo(17.5, 12);
      expect(vwap.values[2]).toBeCloseTo((10 + 60 + 120) / 8, 12);
    });

    it('stays null until some volume has traded', () => {
      const vwap = lineOf(computeIndicator(makeSeries([10, 20], { volumes: [0, 2] }), { kind: 'VWAP' }));
      expect(vwap.values).toEqual([null, 20]);
    });
  });

  describe('catalog', () => {
    it('expands the band indicator into three aligned lines', () => {
      const series = makeSeries(wave);
      const computations = computeCatalogIndicators(series, ['SMA_20', 'BOLLINGER_20_2', 'VWAP']);

      expect(computations.map((c) => c.shape)).toEqual(['line', 'band', 'line']);
      const keys = computations.flatMap(indicatorLines).map((l) => l.key);
      expect(keys).toEqual(['sma_20', 'bb_20_2_upper', 'bb_20_2_middle', 'bb_20_2_lower', 'vwap']);
      for (const line of computations.flatMap(indicatorLines)) {
        expect(line.values).toHaveLength(series.bars.length);
      }
    });

    it('builds stable keys per selector', () => {
      expect(selectorKey({ kind: 'SMA', window: 50 })).toBe('sma_50');
      expect(selectorKey({ kind: 'EMA', span: 20 })).toBe('ema_20');
      expect(selectorKey({ kind: 'VWAP' })).toBe('vwap');
    });
  });
});
