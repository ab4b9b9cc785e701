/**
 * INDICATORS MODULE INDEX
 */

export * from './indicator.types.js';
export * from './indicator-engine.service.js';
export { rollingMean, rollingSampleStd, exponentialMean, cumulativeVwap, mean, sampleStd } from './indicator.math.js';
