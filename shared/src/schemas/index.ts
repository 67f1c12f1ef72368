/**
 * Shared Zod schemas for Storekeep
 *
 * Request bodies and query strings for every section.
 */

export * from './common.js';
export * from './auth.js';
export * from './customers.js';
export * from './orders.js';
export * from './finance.js';
export * from './tasks.js';
