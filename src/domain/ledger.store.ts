/**
 * Ledger Store
 *
 * Owns the committed LedgerState and the single writer lock for the
 * equipment + loan consistency domain. A mutation writes its audit batch
 * first and the ledger document second; the document records the last audit
 * sequence it covers, so a batch without its document is dropped on load.
 * Until both writes succeed readers keep seeing the previous state.
 */

import type { AuditDraft, AuditEntry, Equipment, Loan, User } from '../types/records';
import { StorageError, StorageErrors } from '../types/errors';
import { Result, ok, err } from '../types/context';
import type { StorageEngine } from '../lib/storage';
import { createMutex } from '../lib/mutex';
import { logDebug, logError } from '../lib/logger';
import type { AuditTrail } from './audit.service';
import { persistedLedgerSchema } from './ledger.schema';
import { LedgerState, createState, emptyState, serializeState } from './ledger.state';

// ============================================
// TYPES
// ============================================

/**
 * What a mutation produces: the next state, the audit entries describing it
 * and the value handed back to the caller
 */
export interface Mutation<T> {
  state: LedgerState;
  audit: AuditDraft[];
  data: T;
}

export interface CapturedLedger {
  state: LedgerState;
  audit: AuditEntry[];
  capturedAt: Date;
}

export interface RestoredLedger {
  revision: number;
  equipment: Equipment[];
  loans: Loan[];
  users: User[];
  audit: AuditEntry[];
}

/**
 * Wrap the outcome of a successful `build` step
 */
export function commit<T>(state: LedgerState, audit: AuditDraft[], data: T): Result<Mutation<T>, never> {
  return ok({ state, audit, data });
}

const LEDGER_KEY = 'ledger';

// ============================================
// LEDGER STORE
// ============================================

export class LedgerStore {
  private state: LedgerState = emptyState();
  private writer = createMutex();

  constructor(
    private storage: StorageEngine,
    readonly audit: AuditTrail,
    private clock: () => Date
  ) {}

  now(): Date {
    return this.clock();
  }

  /**
   * Latest committed state. Safe to read without the lock.
   */
  current(): LedgerState {
    return this.state;
  }

  /**
   * Load committed state and its audit trail from storage
   */
  async load(): Promise<Result<LedgerState, StorageError>> {
    return this.writer.run(async (): Promise<Result<LedgerState, StorageError>> => {
      let raw: unknown;
      try {
        raw = await this.storage.atomicRead(LEDGER_KEY);
      } catch (error) {
        return err(StorageErrors.UNAVAILABLE(`read ${LEDGER_KEY}`, error));
      }

      let loaded = emptyState();
      if (raw !== null) {
        const parsed = persistedLedgerSchema.safeParse(raw);
        if (!parsed.success) {
          return err(StorageErrors.CORRUPT_STATE(LEDGER_KEY, parsed.error.message));
        }
        loaded = createState(parsed.data);
      }

      const audit = await this.audit.load(loaded.generation, loaded.auditSequence);
      if (!audit.success) {
        return audit;
      }

      this.state = loaded;
      logDebug('Ledger loaded', {
        generation: loaded.generation,
        revision: loaded.revision,
        equipment: loaded.equipment.size,
        loans: loaded.loans.size,
        audit_entries: this.audit.size,
      });
      return ok(loaded);
    });
  }

  /**
   * Run a validate-then-mutate step under the writer lock.
   *
   * `build` sees the committed state and must not await: the whole
   * check-then-act sequence happens against one state. A failed result from
   * `build` leaves everything untouched.
   */
  async mutate<T, E>(
    build: (state: LedgerState, now: Date) => Result<Mutation<T>, E>
  ): Promise<Result<T, E | StorageError>> {
    return this.writer.run(async (): Promise<Result<T, E | StorageError>> => {
      const base = this.state;
      const built = build(base, this.clock());
      if (!built.success) {
        return err(built.error);
      }

      const { state: draft, audit, data } = built.data;

      const staged = await this.audit.stage(audit);
      if (!staged.success) {
        return err(staged.error);
      }

      const next: LedgerState = { ...draft, auditSequence: staged.data.sequence };
      try {
        await this.storage.atomicWrite(LEDGER_KEY, serializeState(next));
      } catch (error) {
        logError('Ledger commit failed', {
          revision: next.revision,
          error: error instanceof Error ? error.message : String(error),
        });
        return err(StorageErrors.UNAVAILABLE(`write ${LEDGER_KEY}`, error));
      }

      staged.data.commit();
      this.state = next;
      return ok(data);
    });
  }

  /**
   * Capture the committed state and the matching audit prefix. Holds the
   * writer lock only while references are copied.
   */
  async capture(): Promise<CapturedLedger> {
    return this.writer.run(() => ({
      state: this.state,
      audit: this.audit.entriesUpTo(this.audit.size),
      capturedAt: this.clock(),
    }));
  }

  /**
   * Replace the live state wholesale. The restored audit trail is written
   * under a new generation first; switching the ledger document to that
   * generation is the commit point.
   */
  async replace(
    restored: RestoredLedger,
    describe: (next: LedgerState) => AuditDraft
  ): Promise<Result<LedgerState, StorageError>> {
    return this.writer.run(async (): Promise<Result<LedgerState, StorageError>> => {
      const restoredState = createState({
        generation: this.state.generation + 1,
        revision: Math.max(this.state.revision, restored.revision) + 1,
        audit_sequence: 0,
        equipment: restored.equipment,
        loans: restored.loans,
        users: restored.users,
      });

      const staged = await this.audit.stageReplacement(restoredState.generation, restored.audit, [
        describe(restoredState),
      ]);
      if (!staged.success) {
        return err(staged.error);
      }

      const next: LedgerState = { ...restoredState, auditSequence: staged.data.sequence };
      try {
        await this.storage.atomicWrite(LEDGER_KEY, serializeState(next));
      } catch (error) {
        return err(StorageErrors.UNAVAILABLE(`write ${LEDGER_KEY}`, error));
      }

      staged.data.commit();
      this.state = next;
      return ok(next);
    });
  }
}
