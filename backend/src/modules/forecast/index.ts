/**
 * FORECAST MODULE INDEX
 */

export * from './forecast.types.js';
export * from './forecast.service.js';
export * from './trading-calendar.js';
export * from './models/index.js';
