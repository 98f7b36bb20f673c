export * from './filters.js';
export * from './validation.js';
