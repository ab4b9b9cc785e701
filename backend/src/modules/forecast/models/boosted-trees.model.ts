/**
 * Gradient-Boosted Regression Trees
 * =================================
 * Squared-error boosting with small CART trees and L2-shrunk leaves.
 * Deterministic: no row or column subsampling.
 */

import type { IRegressionModel } from './regression.types.js';

export type RegressionTreeNode =
  | { type: 'leaf'; value: number; n: number }
  | { type: 'split'; feature: number; threshold: number; left: RegressionTreeNode; right: RegressionTreeNode };

export interface BoostedTreesConfig {
  nEstimators: number;
  learningRate: number;
  maxDepth: number;
  minLeaf: number;
  lambda: number;   // L2 on leaf weights
}

export const DEFAULT_BOOSTED_TREES_CONFIG: BoostedTreesConfig = {
  nEstimators: 100,
  learningRate: 0.3,
  maxDepth: 3,
  minLeaf: 1,
  lambda: 1,
};

interface SplitCandidate {
  feature: number;
  threshold: number;
  gain: number;
  left: number[];
  right: number[];
}

function leafValue(sum: number, n: number, lambda: number): number {
  return sum / (n + lambda);
}

export class BoostedRegressionTrees implements IRegressionModel {
  readonly key = 'boosted-trees' as const;
  private readonly config: BoostedTreesConfig;
  private baseScore = 0;
  private trees: RegressionTreeNode[] = [];
  private fitted = false;

  constructor(config: Partial<BoostedTreesConfig> = {}) {
    this.config = { ...DEFAULT_BOOSTED_TREES_CONFIG, ...config };
  }

  get treeCount(): number {
    return this.trees.length;
  }

  fit(X: number[][], y: number[]): void {
    if (X.length !== y.length) throw new Error(`X/y length mismatch: ${X.length} vs ${y.length}`);
    if (X.length === 0) throw new Error('empty training set');
    if (y.some((v) => !Number.isFinite(v)) || X.some((row) => row.some((v) => !Number.isFinite(v)))) {
      throw new Error('training data contains non-finite values');
    }

    const n = y.length;
    this.baseScore = y.reduce((s, v) => s + v, 0) / n;
    this.trees = [];

    const pred = new Array<number>(n).fill(this.baseScore);
    const all = Array.from({ length: n }, (_, i) => i);

    for (let round = 0; round < this.config.nEstimators; round++) {
      const residual = y.map((v, i) => v - pred[i]);
      const tree = this.buildNode(X, residual, all, 0);
      this.trees.push(tree);
      for (let i = 0; i < n; i++) {
        pred[i] += this.config.learningRate * this.evaluate(tree, X[i]);
      }
    }
    this.fitted = true;
  }

  predictOne(x: number[]): number {
    if (!this.fitted) throw new Error('model is not fitted');
    let out = this.baseScore;
    for (const tree of this.trees) {
      out += this.config.learningRate * this.evaluate(tree, x);
    }
    return out;
  }

  private evaluate(root: RegressionTreeNode, x: number[]): number {
    let node = root;
    while (node.type === 'split') {
      node = (x[node.feature] ?? 0) <= node.threshold ? node.left : node.right;
    }
    return node.value;
  }

  private buildNode(X: number[][], r: number[], idx: number[], depth: number): RegressionTreeNode {
    const { maxDepth, minLeaf, lambda } = this.config;
    const sum = idx.reduce((s, i) => s + r[i], 0);
    const leaf: RegressionTreeNode = { type: 'leaf', value: leafValue(sum, idx.length, lambda), n: idx.length };

    if (depth >= maxDepth || idx.length < 2 * minLeaf) return leaf;

    const best = this.bestSplit(X, r, idx, sum);
    if (!best || best.gain <= 1e-12) return leaf;

    return {
      type: 'split',
      feature: best.feature,
      threshold: best.threshold,
      left: this.buildNode(X, r, best.left, depth + 1),
      right: this.buildNode(X, r, best.right, depth + 1),
    };
  }

  private bestSplit(X: number[][], r: number[], idx: number[], total: number): SplitCandidate | null {
    const { minLeaf, lambda } = this.config;
    const m = X[idx[0]]?.length ?? 0;
    const parentScore = (total * total) / (idx.length + lambda);
    let best: SplitCandidate | null = null;

    for (let f = 0; f < m; f++) {
      const sorted = [...idx].sort((a, b) => X[a][f] - X[b][f]);
      let leftSum = 0;

      for (let k = 0; k < sorted.length - 1; k++) {
        leftSum += r[sorted[k]];
        const nL = k + 1;
        const nR = sorted.length - nL;
        const here = X[sorted[k]][f];
        const next = X[sorted[k + 1]][f];
        if (here === next || nL < minLeaf || nR < minLeaf) continue;

        const rightSum = total - leftSum;
        const gain = (leftSum * leftSum) / (nL + lambda) + (rightSum * rightSum) / (nR + lambda) - parentScore;
        if (!best || gain > best.gain) {
          best = {
            feature: f,
            threshold: (here + next) / 2,
            gain,
            left: sorted.slice(0, nL),
            right: sorted.slice(nL),
          };
        }
      }
    }

    return best;
  }
}
