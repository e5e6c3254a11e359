/**
 * Equipment ledger public API
 */

export * from './types';
export * from './domain';
export { openLedger, createStorageEngine } from './ledger';
export type { Ledger, OpenLedgerOptions } from './ledger';
export { createConfig, loadConfig } from './lib/config';
export type { LedgerConfig, LedgerConfigInput, StorageConfig } from './lib/config';
export { ScryptCredentialHasher } from './lib/credentials';
export type { CredentialHasher } from './lib/credentials';
export { MemoryStorageEngine } from './lib/storage';
export type { StorageEngine } from './lib/storage';
export { SupabaseStorageEngine, createServiceClient } from './lib/supabase-storage';
export { setLogLevel, getLogLevel } from './lib/logger';
export type { LogLevel } from './lib/logger';
