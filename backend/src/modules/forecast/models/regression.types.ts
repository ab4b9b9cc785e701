/**
 * REGRESSION MODEL CONTRACT
 * =========================
 *
 * fit() may throw; the forecast adapter turns that into FitError.
 */

export type RegressionModelKey = 'boosted-trees' | 'linear';

export interface IRegressionModel {
  readonly key: RegressionModelKey;
  fit(X: number[][], y: number[]): void;
  predictOne(x: number[]): number;
}

export type RegressionModelFactory = () => IRegressionModel;
