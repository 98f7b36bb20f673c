export * from './cashflow.js';
export * from './exports.js';
