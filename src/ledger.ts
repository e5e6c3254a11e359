/**
 * Composition root: wires storage, the ledger store and the services
 * together and loads the committed state.
 */

import { StorageError } from './types/errors';
import { Result, ok } from './types/context';
import type { LedgerConfig, StorageConfig } from './lib/config';
import { CredentialHasher, ScryptCredentialHasher } from './lib/credentials';
import { MemoryStorageEngine, StorageEngine } from './lib/storage';
import { SupabaseStorageEngine, createServiceClient } from './lib/supabase-storage';
import { logError, logInfo, setLogLevel } from './lib/logger';
import { AuditTrail } from './domain/audit.service';
import { LedgerStore } from './domain/ledger.store';
import { IdentityService } from './domain/identity.service';
import { EquipmentService } from './domain/equipment.service';
import { LoanService } from './domain/loan.service';
import { SnapshotService } from './domain/snapshot.service';
import { StatisticsService } from './domain/statistics.service';

export interface OpenLedgerOptions {
  config: LedgerConfig;
  /** Overrides the engine selected by config.storage */
  storage?: StorageEngine;
  hasher?: CredentialHasher;
  clock?: () => Date;
}

export interface Ledger {
  config: LedgerConfig;
  store: LedgerStore;
  audit: AuditTrail;
  identity: IdentityService;
  equipment: EquipmentService;
  loans: LoanService;
  snapshots: SnapshotService;
  statistics: StatisticsService;
  /** Stop background work such as automatic backups */
  close(): void;
}

export function createStorageEngine(config: StorageConfig): StorageEngine {
  if (config.kind === 'supabase') {
    return new SupabaseStorageEngine(
      createServiceClient(config.url, config.serviceRoleKey),
      config.snapshotBucket
    );
  }
  return new MemoryStorageEngine();
}

export async function openLedger(options: OpenLedgerOptions): Promise<Result<Ledger, StorageError>> {
  const { config } = options;
  setLogLevel(config.logLevel);

  const clock = options.clock ?? (() => new Date());
  const storage = options.storage ?? createStorageEngine(config.storage);
  const audit = new AuditTrail(storage, clock);
  const store = new LedgerStore(storage, audit, clock);

  const loaded = await store.load();
  if (!loaded.success) {
    logError('Ledger could not be loaded', { code: loaded.error.code });
    return loaded;
  }

  const snapshots = new SnapshotService(store, storage, config);
  let stopAutoBackup: (() => void) | null = null;
  if (config.autoBackupIntervalMs !== null) {
    const started = snapshots.startAutoBackup(config.autoBackupIntervalMs);
    if (started.success) {
      stopAutoBackup = started.data;
    }
  }

  logInfo('Ledger opened', {
    storage: options.storage ? 'custom' : config.storage.kind,
    revision: loaded.data.revision,
  });

  return ok({
    config,
    store,
    audit,
    identity: new IdentityService(store, options.hasher ?? new ScryptCredentialHasher(), config),
    equipment: new EquipmentService(store),
    loans: new LoanService(store, config),
    snapshots,
    statistics: new StatisticsService(store, config),
    close: () => {
      if (stopAutoBackup) {
        stopAutoBackup();
        stopAutoBackup = null;
      }
    },
  });
}
