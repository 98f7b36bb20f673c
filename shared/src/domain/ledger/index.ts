export * from './employeeLedger.js';
