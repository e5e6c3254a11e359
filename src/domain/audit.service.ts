/**
 * Audit Trail
 *
 * Append-only record of every state-changing operation. Appends are
 * serialized by the trail's own lock and each call is one storage write, so
 * a batch of entries becomes visible together or not at all.
 *
 * Storage layout: `audit/<generation>/<first sequence>` holds one batch.
 * A restore starts a new generation. The ledger document records the last
 * committed sequence; batches written past it are ignored on load and
 * overwritten by the next commit.
 */

import type { AuditDraft, AuditEntry, AuditOperation } from '../types/records';
import { StorageError, StorageErrors } from '../types/errors';
import { Result, ok, err } from '../types/context';
import type { StorageEngine } from '../lib/storage';
import { createMutex } from '../lib/mutex';
import { logError } from '../lib/logger';
import { auditBatchSchema } from './ledger.schema';

// ============================================
// TYPES
// ============================================

export interface AuditQuery {
  entityId?: string;
  actorId?: string;
  operation?: AuditOperation;
  /** Inclusive lower bound */
  from?: Date | string;
  /** Inclusive upper bound */
  to?: Date | string;
}

export interface StagedAudit {
  entries: AuditEntry[];
  /** Last sequence of the trail once committed */
  sequence: number;
  /** Make the staged entries part of the live trail */
  commit(): void;
}

const AUDIT_PREFIX = 'audit/';

// ============================================
// AUDIT TRAIL
// ============================================

export class AuditTrail {
  private entries: AuditEntry[] = [];
  private generation = 0;
  private lock = createMutex();

  constructor(
    private storage: StorageEngine,
    private clock: () => Date
  ) {}

  /**
   * Load the batches of one generation from storage, dropping entries past
   * `watermark` when one is given
   */
  async load(generation: number, watermark?: number): Promise<Result<void, StorageError>> {
    const prefix = batchPrefix(generation);
    const loaded: AuditEntry[] = [];

    try {
      const keys = await this.storage.listKeys(prefix);
      for (const key of keys) {
        const parsed = auditBatchSchema.safeParse(await this.storage.atomicRead(key));
        if (!parsed.success) {
          return err(StorageErrors.CORRUPT_STATE(key, parsed.error.message));
        }
        loaded.push(...parsed.data);
      }
    } catch (error) {
      return err(StorageErrors.UNAVAILABLE(`load ${prefix}`, error));
    }

    const committed =
      watermark === undefined ? loaded : loaded.filter((entry) => entry.sequence <= watermark);
    committed.sort((a, b) => a.sequence - b.sequence);
    this.entries = committed;
    this.generation = generation;
    return ok(undefined);
  }

  /** Number of entries appended so far */
  get size(): number {
    return this.entries.length;
  }

  /**
   * First `count` entries, in order. Used to cut a snapshot at a watermark.
   */
  entriesUpTo(count: number): AuditEntry[] {
    return this.entries.slice(0, count);
  }

  async append(draft: AuditDraft): Promise<Result<AuditEntry, StorageError>> {
    const appended = await this.appendAll([draft]);
    if (!appended.success) {
      return appended;
    }
    return ok(appended.data[0]);
  }

  /**
   * Append several entries as one write. A failed write leaves the trail
   * unchanged and is reported as StorageUnavailable.
   */
  async appendAll(drafts: AuditDraft[]): Promise<Result<AuditEntry[], StorageError>> {
    if (drafts.length === 0) {
      return ok([]);
    }

    return this.lock.run(async (): Promise<Result<AuditEntry[], StorageError>> => {
      const batch = this.stamp(drafts, this.last());
      const written = await this.writeBatch(this.generation, batch);
      if (!written.success) {
        return written;
      }

      this.entries.push(...batch);
      return ok(batch);
    });
  }

  /**
   * Write a batch without making it visible. The caller holds the ledger's
   * writer lock and commits once the ledger document naming the batch's
   * last sequence is durable.
   */
  async stage(drafts: AuditDraft[]): Promise<Result<StagedAudit, StorageError>> {
    return this.lock.run(async (): Promise<Result<StagedAudit, StorageError>> => {
      const last = this.last();
      const batch = this.stamp(drafts, last);
      if (batch.length > 0) {
        const written = await this.writeBatch(this.generation, batch);
        if (!written.success) {
          return written;
        }
      }

      const tail = batch[batch.length - 1] ?? last;
      return ok({
        entries: batch,
        sequence: tail ? tail.sequence : 0,
        commit: () => {
          this.entries.push(...batch);
        },
      });
    });
  }

  /**
   * Write a complete trail under a new generation without making it live.
   * The caller commits once the matching ledger state is durable.
   */
  async stageReplacement(
    generation: number,
    restored: AuditEntry[],
    drafts: AuditDraft[]
  ): Promise<Result<StagedAudit, StorageError>> {
    return this.lock.run(async (): Promise<Result<StagedAudit, StorageError>> => {
      const ordered = [...restored].sort((a, b) => a.sequence - b.sequence);
      const entries = [...ordered, ...this.stamp(drafts, ordered[ordered.length - 1])];

      if (entries.length > 0) {
        const written = await this.writeBatch(generation, entries);
        if (!written.success) {
          return written;
        }
      }

      const tail = entries[entries.length - 1];
      return ok({
        entries,
        sequence: tail ? tail.sequence : 0,
        commit: () => {
          this.entries = entries;
          this.generation = generation;
        },
      });
    });
  }

  /**
   * Entries matching the filters in ascending order. The result is lazy and
   * restartable: every iteration scans the trail again and stops at the
   * entries present when that iteration started.
   */
  query(filters: AuditQuery = {}): Iterable<AuditEntry> {
    const trail = this;
    const from = filters.from === undefined ? undefined : toIso(filters.from);
    const to = filters.to === undefined ? undefined : toIso(filters.to);

    return {
      *[Symbol.iterator]() {
        const source = trail.entries;
        const end = source.length;
        for (let i = 0; i < end; i++) {
          const entry = source[i];
          if (filters.entityId !== undefined && entry.entity_id !== filters.entityId) continue;
          if (filters.actorId !== undefined && entry.actor_id !== filters.actorId) continue;
          if (filters.operation !== undefined && entry.operation !== filters.operation) continue;
          if (from !== undefined && entry.timestamp < from) continue;
          if (to !== undefined && entry.timestamp > to) continue;
          yield entry;
        }
      },
    };
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private last(): AuditEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  private async writeBatch(generation: number, batch: AuditEntry[]): Promise<Result<void, StorageError>> {
    const key = batchKey(generation, batch[0].sequence);
    try {
      await this.storage.atomicWrite(key, batch);
    } catch (error) {
      logError('Audit append failed', {
        key,
        operations: batch.map((entry) => entry.operation),
        error: error instanceof Error ? error.message : String(error),
      });
      return err(StorageErrors.AUDIT_WRITE_FAILED(error));
    }
    return ok(undefined);
  }

  /**
   * Assign sequences and timestamps. Timestamps never go backwards, so
   * sequence order and timestamp order agree.
   */
  private stamp(drafts: AuditDraft[], last: AuditEntry | undefined): AuditEntry[] {
    let sequence = last ? last.sequence : 0;
    let timestamp = this.clock().toISOString();
    if (last && timestamp < last.timestamp) {
      timestamp = last.timestamp;
    }

    return drafts.map((draft) => {
      sequence += 1;
      return { ...draft, sequence, timestamp };
    });
  }
}

function batchPrefix(generation: number): string {
  return `${AUDIT_PREFIX}${generation}/`;
}

function batchKey(generation: number, firstSequence: number): string {
  return `${batchPrefix(generation)}${String(firstSequence).padStart(12, '0')}`;
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
