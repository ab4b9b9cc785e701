export * from './returns.types.js';
export * from './returns.service.js';
