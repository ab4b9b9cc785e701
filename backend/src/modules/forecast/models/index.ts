import { BoostedRegressionTrees } from './boosted-trees.model.js';
import { LinearRegression } from './linear.model.js';
import type { RegressionModelFactory, RegressionModelKey } from './regression.types.js';

export * from './regression.types.js';
export { BoostedRegressionTrees, DEFAULT_BOOSTED_TREES_CONFIG } from './boosted-trees.model.js';
export type { BoostedTreesConfig, RegressionTreeNode } from './boosted-trees.model.js';
export { LinearRegression } from './linear.model.js';

export const REGRESSION_MODELS: Readonly<Record<RegressionModelKey, RegressionModelFactory>> = {
  'boosted-trees': () => new BoostedRegressionTrees(),
  linear: () => new LinearRegression(),
};

export const REGRESSION_MODEL_KEYS = ['boosted-trees', 'linear'] as const satisfies readonly RegressionModelKey[];
