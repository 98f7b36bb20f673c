export * from './periods.js';
export * from './cashflow.js';
