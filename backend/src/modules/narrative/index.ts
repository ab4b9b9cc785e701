/**
 * NARRATIVE MODULE INDEX
 */

export * from './narrative.types.js';
export * from './narrative.client.js';
export * from './narrative.factory.js';
export { CHART_ANALYSIS_PROMPT } from './narrative.prompt.js';
export * from './providers/index.js';
