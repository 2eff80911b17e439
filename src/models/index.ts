/**
 * Data Models
 *
 * Barrel export for all model interfaces.
 */

// Source models
export * from './source-item.js';

// Candidate card models
export * from './candidate.js';

// Signature models
export * from './signature.js';

// Ledger models
export * from './ledger.js';
