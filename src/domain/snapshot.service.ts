/**
 * Snapshot / Backup Service
 *
 * Snapshots copy the committed state under the writer lock and write the
 * bundle outside it, so a slow backup never blocks loans. Restore replaces
 * the live ledger wholesale and is audited.
 */

import type { SnapshotHandle } from '../types/records';
import {
  AuthError,
  SnapshotError,
  SnapshotErrors,
  StorageError,
  ValidationError,
  ValidationErrors,
} from '../types/errors';
import { ActorContext, ServiceContext, SystemContext, Result, ok, err } from '../types/context';
import type { LedgerConfig } from '../lib/config';
import type { StorageEngine } from '../lib/storage';
import { isPositiveInt } from '../lib/validation';
import { logError, logInfo, logWarning } from '../lib/logger';
import type { LedgerStore } from './ledger.store';
import { serializeState } from './ledger.state';
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_SCHEMA_VERSION,
  SnapshotBundle,
  snapshotBundleSchema,
  snapshotHeaderSchema,
} from './ledger.schema';
import { requireCapability } from './permissions';

const SCHEDULER: SystemContext = { systemId: 'scheduler', reason: 'automatic backup' };

type SnapshotFailure = AuthError | SnapshotError;
type RestoreFailure = AuthError | SnapshotError | StorageError;

export class SnapshotService {
  private backupInFlight = false;

  constructor(
    private store: LedgerStore,
    private storage: StorageEngine,
    private config: LedgerConfig
  ) {}

  /**
   * Write a point-in-time bundle of the whole ledger. The live ledger is
   * untouched whether or not the write succeeds.
   */
  async snapshot(actor: ActorContext): Promise<Result<SnapshotHandle, SnapshotFailure>> {
    const allowed = requireCapability(this.store.current(), actor, 'snapshot.create');
    if (!allowed.success) {
      return allowed;
    }

    const captured = await this.store.capture();
    const collections = serializeState(captured.state);
    const bundle: SnapshotBundle = {
      format: SNAPSHOT_FORMAT,
      schema_version: SNAPSHOT_SCHEMA_VERSION,
      created_at: captured.capturedAt.toISOString(),
      revision: captured.state.revision,
      equipment: collections.equipment,
      loans: collections.loans,
      users: collections.users,
      audit: captured.audit,
    };

    const written = await this.writeBundle(JSON.stringify(bundle));
    if (!written.success) {
      logError('Snapshot failed', {
        code: written.error.code,
        revision: bundle.revision,
      });
      return written;
    }

    const handle = describe(written.data, bundle);
    logInfo('Snapshot created', {
      snapshot_id: handle.id,
      revision: handle.revision,
      audit_entries: handle.audit_count,
    });
    return ok(handle);
  }

  /**
   * Replace the live ledger with the contents of a snapshot. The restore
   * itself is appended to the audit trail after the restored entries.
   */
  async restore(
    ctx: ServiceContext,
    snapshot: SnapshotHandle | string
  ): Promise<Result<SnapshotHandle, RestoreFailure>> {
    const allowed = requireCapability(this.store.current(), ctx, 'snapshot.restore');
    if (!allowed.success) {
      return allowed;
    }

    const snapshotId = typeof snapshot === 'string' ? snapshot : snapshot.id;
    const bundle = await this.readBundle(snapshotId);
    if (!bundle.success) {
      return bundle;
    }

    const restored = bundle.data;
    const replaced = await this.store.replace(
      {
        revision: restored.revision,
        equipment: restored.equipment,
        loans: restored.loans,
        users: restored.users,
        audit: restored.audit,
      },
      (next) => ({
        actor_id: ctx.userId,
        operation: 'snapshot.restore',
        entity_type: 'ledger',
        entity_id: snapshotId,
        before_status: null,
        after_status: null,
        details: {
          snapshot_revision: restored.revision,
          revision: next.revision,
          equipment: restored.equipment.length,
          loans: restored.loans.length,
          audit_entries: restored.audit.length,
        },
      })
    );

    if (!replaced.success) {
      logError('Restore failed', { snapshot_id: snapshotId, code: replaced.error.code });
      return replaced;
    }

    logInfo('Snapshot restored', { snapshot_id: snapshotId, revision: replaced.data.revision });
    return ok(describe(snapshotId, restored));
  }

  /**
   * Take snapshots periodically under the scheduler context. Failures are
   * logged; the returned function stops the timer.
   */
  startAutoBackup(
    intervalMs: number | null = this.config.autoBackupIntervalMs
  ): Result<() => void, ValidationError> {
    if (!isPositiveInt(intervalMs)) {
      return err(ValidationErrors.OUT_OF_RANGE('autoBackupIntervalMs', 1));
    }

    const timer = setInterval(() => {
      void this.runScheduledBackup();
    }, intervalMs);
    timer.unref();

    logInfo('Automatic backup started', { interval_ms: intervalMs });
    return ok(() => clearInterval(timer));
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private async runScheduledBackup(): Promise<void> {
    if (this.backupInFlight) {
      logWarning('Skipping automatic backup; previous backup still running');
      return;
    }

    this.backupInFlight = true;
    try {
      await this.snapshot(SCHEDULER);
    } catch (error) {
      logError('Automatic backup crashed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.backupInFlight = false;
    }
  }

  private async writeBundle(blob: string): Promise<Result<string, SnapshotError>> {
    const write = this.storage.durableSnapshotWrite(blob).then(
      (id): Result<string, SnapshotError> => ok(id),
      (error: unknown): Result<string, SnapshotError> => err(SnapshotErrors.WRITE_FAILED(error))
    );

    const timeoutMs = this.config.snapshotTimeoutMs;
    if (timeoutMs === null) {
      return write;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Result<string, SnapshotError>>((resolve) => {
      timer = setTimeout(() => resolve(err(SnapshotErrors.TIMED_OUT(timeoutMs))), timeoutMs);
    });

    try {
      return await Promise.race([write, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readBundle(snapshotId: string): Promise<Result<SnapshotBundle, SnapshotError>> {
    let blob: string;
    try {
      blob = await this.storage.readSnapshot(snapshotId);
    } catch (error) {
      return err(SnapshotErrors.READ_FAILED(snapshotId, error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch {
      return err(SnapshotErrors.INCOMPATIBLE(snapshotId, 'not a JSON document'));
    }

    const header = snapshotHeaderSchema.safeParse(raw);
    if (!header.success) {
      return err(SnapshotErrors.INCOMPATIBLE(snapshotId, 'missing format header'));
    }
    if (header.data.format !== SNAPSHOT_FORMAT) {
      return err(SnapshotErrors.INCOMPATIBLE(snapshotId, `unknown format ${header.data.format}`));
    }
    if (header.data.schema_version !== SNAPSHOT_SCHEMA_VERSION) {
      return err(
        SnapshotErrors.INCOMPATIBLE(
          snapshotId,
          `schema version ${header.data.schema_version}, expected ${SNAPSHOT_SCHEMA_VERSION}`
        )
      );
    }

    const parsed = snapshotBundleSchema.safeParse(raw);
    if (!parsed.success) {
      return err(SnapshotErrors.INCOMPATIBLE(snapshotId, parsed.error.message));
    }

    const problem = findInconsistency(parsed.data);
    if (problem) {
      return err(SnapshotErrors.INCOMPATIBLE(snapshotId, problem));
    }

    return ok(parsed.data);
  }
}

function describe(id: string, bundle: SnapshotBundle): SnapshotHandle {
  return {
    id,
    created_at: bundle.created_at,
    schema_version: bundle.schema_version,
    revision: bundle.revision,
    equipment_count: bundle.equipment.length,
    loan_count: bundle.loans.length,
    audit_count: bundle.audit.length,
  };
}

/**
 * Reject bundles whose loans and equipment disagree: every open loan must
 * point at LOANED equipment and every LOANED item must have exactly one
 * open loan.
 */
function findInconsistency(bundle: SnapshotBundle): string | null {
  const statusById = new Map(bundle.equipment.map((item) => [item.id, item.status] as const));
  const openByEquipment = new Map<string, number>();

  for (const loan of bundle.loans) {
    if (!statusById.has(loan.equipment_id)) {
      return `loan ${loan.id} references unknown equipment ${loan.equipment_id}`;
    }
    if (loan.status === 'OPEN') {
      openByEquipment.set(loan.equipment_id, (openByEquipment.get(loan.equipment_id) ?? 0) + 1);
    }
  }

  for (const [equipmentId, status] of statusById) {
    const open = openByEquipment.get(equipmentId) ?? 0;
    if ((status === 'LOANED') !== (open === 1) || open > 1) {
      return `equipment ${equipmentId} is ${status} with ${open} open loans`;
    }
  }

  return null;
}
