/**
 * @storekeep/shared - Shared types, schemas and domain helpers
 *
 * Used by the server for request validation and by any front end that
 * talks to the API.
 */

// Record and response shapes (type-only)
export type * from './types/index.js';

// Zod schemas + inferred input types
export * from './schemas/index.js';

// Validators
export * from './validators/index.js';

// Domain constants and date ranges
export * from './domain/index.js';

// Date utils
export * from './utils/dateHelpers.js';
