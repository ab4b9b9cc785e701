export * from './chart.types.js';
export * from './chart-composer.service.js';
