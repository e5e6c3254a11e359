/**
 * Type exports for the ledger domain layer
 */

// Record types
export * from './records';

// Error types
export * from './errors';

// Context types
export * from './context';
