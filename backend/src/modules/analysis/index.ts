/**
 * ANALYSIS MODULE INDEX
 */

export * from './analysis.types.js';
export * from './analysis.session.js';
export * from './analysis.pipeline.js';
export * from './analysis.report.js';
