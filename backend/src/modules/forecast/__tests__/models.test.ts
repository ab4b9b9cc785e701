import { describe, it, expect } from 'vitest';
import { BoostedRegressionTrees } from '../models/boosted-trees.model.js';
import { LinearRegression } from '../models/linear.model.js';

describe('LinearRegression', () => {
  it('recovers an exact line', () => {
    const model = new LinearRegression();
    model.fit([[1], [2], [3], [4]], [3, 5, 7, 9]);

    expect(model.params?.beta).toBeCloseTo(2, 12);
    expect(model.params?.alpha).toBeCloseTo(1, 12);
    expect(model.predictOne([10])).toBeCloseTo(21, 12);
  });

  it('refuses a constant feature', () => {
    const model = new LinearRegression();
    expect(() => model.fit([[5], [5], [5]], [1, 2, 3])).toThrow('feature has zero variance');
  });

  it('refuses to predict before fitting', () => {
    expect(() => new LinearRegression().predictOne([1])).toThrow('model is not fitted');
  });
});

describe('BoostedRegressionTrees', () => {
  const X = Array.from({ length: 20 }, (_, i) => [i + 1]);
  const y = X.map(([x]) => 2 * x);

  it('fits the training data far better than the mean baseline', () => {
    const model = new BoostedRegressionTrees();
    model.fit(X, y);

    const mae = X.reduce((s, row, i) => s + Math.abs(model.predictOne(row) - y[i]), 0) / X.length;
    expect(model.treeCount).toBe(100);
    expect(mae).toBeLessThan(1);
    expect(model.predictOne([2])).toBeLessThan(model.predictOne([19]));
  });

  it('is deterministic', () => {
    const a = new BoostedRegressionTrees();
    const b = new BoostedRegressionTrees();
    a.fit(X, y);
    b.fit(X, y);
    expect(a.predictOne([7.5])).toBe(b.predictOne([7.5]));
  });

  it('predicts the constant for a constant target', () => {
    const model = new BoostedRegressionTrees({ nEstimators: 10 });
    model.fit([[1], [2], [3]], [4, 4, 4]);
    expect(model.predictOne([100])).toBeCloseTo(4, 12);
  });

  it('rejects non-finite training values', () => {
    const model = new BoostedRegressionTrees();
    expect(() => model.fit([[1], [Number.NaN]], [1, 2])).toThrow('training data contains non-finite values');
  });
});
