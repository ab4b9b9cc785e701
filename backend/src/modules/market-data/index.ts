/**
 * MARKET DATA MODULE INDEX
 */

export * from './market-data.types.js';
export * from './price-series.js';
export * from './symbols.js';
export * from './providers/index.js';
