/**
 * Ordinary least squares on a single feature.
 */

import type { IRegressionModel } from './regression.types.js';

export interface LinearParams {
  alpha: number;
  beta: number;
}

export class LinearRegression implements IRegressionModel {
  readonly key = 'linear' as const;
  params: LinearParams | null = null;

  fit(X: number[][], y: number[]): void {
    if (X.length !== y.length) throw new Error(`X/y length mismatch: ${X.length} vs ${y.length}`);
    if (X.length < 2) throw new Error('need at least 2 rows');
    if (X.some((row) => row.length !== 1)) throw new Error('linear model expects exactly one feature');

    const x = X.map((row) => row[0]);
    const n = x.length;
    const mx = x.reduce((s, v) => s + v, 0) / n;
    const my = y.reduce((s, v) => s + v, 0) / n;

    let sxy = 0;
    let sxx = 0;
    for (let i = 0; i < n; i++) {
      sxy += (x[i] - mx) * (y[i] - my);
      sxx += (x[i] - mx) ** 2;
    }
    if (sxx === 0) throw new Error('feature has zero variance');

    const beta = sxy / sxx;
    const alpha = my - beta * mx;
    if (!Number.isFinite(alpha) || !Number.isFinite(beta)) {
      throw new Error('non-finite coefficients');
    }
    this.params = { alpha, beta };
  }

  predictOne(x: number[]): number {
    if (!this.params) throw new Error('model is not fitted');
    return this.params.alpha + this.params.beta * x[0];
  }
}
