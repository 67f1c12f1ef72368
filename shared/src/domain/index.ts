export * from './constants.js';
export * from './dateRange.js';
export * from './ledger.js';
