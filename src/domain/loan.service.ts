/**
 * Loan Ledger Service
 *
 * Handles:
 * - Issuing equipment to supervisors within their concurrent-loan limit
 * - Returning loans, optionally sending the equipment for inspection
 * - Open and overdue loan queries
 *
 * Issuance checks and their effects run in one writer-lock step, so two
 * requests racing for the same equipment or the last free slot of a
 * supervisor cannot both succeed.
 */

import * as crypto from 'crypto';
import type { AuditDraft, Loan, LoanStatus, User } from '../types/records';
import {
  AuthError,
  EquipmentError,
  EquipmentErrors,
  LoanError,
  LoanErrors,
  StorageError,
  ValidationError,
  ValidationErrors,
} from '../types/errors';
import { ServiceContext, Result, ok, err } from '../types/context';
import type { LedgerConfig } from '../lib/config';
import { optionalText } from '../lib/validation';
import { logInfo } from '../lib/logger';
import { LedgerStore, commit } from './ledger.store';
import {
  LedgerState,
  StateDraft,
  activeLoanCount,
  loansOfEquipment,
  loansOfSupervisor,
  openLoanOf,
} from './ledger.state';
import { requireCapability } from './permissions';
import { applyEquipmentTransition } from './equipment.service';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// TYPES
// ============================================

export interface IssueLoanInput {
  equipmentId: string;
  supervisorId: string;
  /** Where the equipment is going */
  location?: string;
  notes?: string;
}

export interface IssueBatchInput {
  equipmentIds: string[];
  supervisorId: string;
  location?: string;
  notes?: string;
}

export interface ReturnLoanOptions {
  /** Send the equipment to MAINTENANCE instead of AVAILABLE */
  inspect?: boolean;
  /** Where the equipment was returned to */
  location?: string;
  notes?: string;
}

type LoanFailure = LoanError | EquipmentError | AuthError | ValidationError | StorageError;

/**
 * Classify a loan at a point in time. OVERDUE is never stored.
 */
export function effectiveLoanStatus(loan: Loan, now: Date): LoanStatus {
  if (loan.returned_at !== null) {
    return 'RETURNED';
  }
  return now.toISOString() > loan.due_at ? 'OVERDUE' : 'OPEN';
}

// ============================================
// LOAN SERVICE
// ============================================

export class LoanService {
  constructor(
    private store: LedgerStore,
    private config: LedgerConfig
  ) {}

  /**
   * Issue one piece of equipment to a supervisor
   */
  async issue(ctx: ServiceContext, input: IssueLoanInput): Promise<Result<Loan, LoanFailure>> {
    const issued = await this.issueMany(ctx, {
      equipmentIds: [input.equipmentId],
      supervisorId: input.supervisorId,
      location: input.location,
      notes: input.notes,
    });

    if (!issued.success) {
      return issued;
    }
    return ok(issued.data[0]);
  }

  /**
   * Issue several items to one supervisor. Either every loan is created or
   * none is; the limit check counts the whole batch.
   */
  async issueBatch(ctx: ServiceContext, input: IssueBatchInput): Promise<Result<Loan[], LoanFailure>> {
    if (input.equipmentIds.length === 0) {
      return err(ValidationErrors.REQUIRED_FIELD('equipmentIds'));
    }

    const duplicates = input.equipmentIds.filter((id, index) => input.equipmentIds.indexOf(id) !== index);
    if (duplicates.length > 0) {
      return err(ValidationErrors.DUPLICATE_ITEMS('equipmentIds', [...new Set(duplicates)]));
    }

    return this.issueMany(ctx, input);
  }

  /**
   * Close a loan. A second return of the same loan is AlreadyReturned and
   * changes nothing.
   */
  async returnLoan(
    ctx: ServiceContext,
    loanId: string,
    options: ReturnLoanOptions = {}
  ): Promise<Result<Loan, LoanFailure>> {
    const returned = await this.store.mutate<Loan, LoanError | EquipmentError | AuthError>(
      (state, now) => {
        const allowed = requireCapability(state, ctx, 'loan.return');
        if (!allowed.success) {
          return allowed;
        }

        const loan = state.loans.get(loanId);
        if (!loan) {
          return err(LoanErrors.NOT_FOUND(loanId));
        }
        if (loan.status === 'RETURNED') {
          return err(LoanErrors.ALREADY_RETURNED(loanId, loan.returned_at));
        }

        const draft = new StateDraft(state);
        // returned_at never precedes issued_at, even if the clock stepped back
        const returnedAt = now.toISOString() < loan.issued_at ? loan.issued_at : now.toISOString();
        const notes = optionalText(options.notes);
        const closed: Loan = {
          ...loan,
          status: 'RETURNED',
          returned_at: returnedAt,
          returned_by: ctx.userId,
          notes: notes ?? loan.notes,
        };
        draft.putLoan(closed);

        const target = options.inspect ? 'MAINTENANCE' : 'AVAILABLE';
        const moved = applyEquipmentTransition(draft, {
          equipmentId: loan.equipment_id,
          target,
          origin: 'loan',
          actorId: ctx.userId,
          now,
          location: options.location,
          details: { loan_id: loan.id },
        });
        if (!moved.success) {
          return moved;
        }

        return commit(
          draft.finish(),
          [
            {
              actor_id: ctx.userId,
              operation: 'loan.return',
              entity_type: 'loan',
              entity_id: loan.id,
              before_status: effectiveLoanStatus(loan, now),
              after_status: 'RETURNED',
              details: {
                equipment_id: loan.equipment_id,
                supervisor_id: loan.supervisor_id,
                inspect: Boolean(options.inspect),
                ...(notes ? { notes } : {}),
              },
            },
            moved.data.audit,
          ],
          closed
        );
      }
    );

    if (returned.success) {
      logInfo('Loan returned', {
        loan_id: returned.data.id,
        equipment_id: returned.data.equipment_id,
        inspect: Boolean(options.inspect),
      });
    }
    return returned;
  }

  effectiveStatus(loan: Loan, now: Date = this.store.now()): LoanStatus {
    return effectiveLoanStatus(loan, now);
  }

  // ============================================
  // QUERIES
  // ============================================

  getLoan(loanId: string): Result<Loan, LoanError> {
    const loan = this.store.current().loans.get(loanId);
    if (!loan) {
      return err(LoanErrors.NOT_FOUND(loanId));
    }
    return ok(loan);
  }

  /**
   * The open loan holding a piece of equipment, for scan-driven returns
   */
  openLoanForEquipment(equipmentId: string): Result<Loan, LoanError> {
    const loan = openLoanOf(this.store.current(), equipmentId);
    if (!loan) {
      return err(LoanErrors.NO_OPEN_LOAN(equipmentId));
    }
    return ok(loan);
  }

  /** Loan history of one item, oldest first */
  loansForEquipment(equipmentId: string): Loan[] {
    return loansOfEquipment(this.store.current(), equipmentId);
  }

  /**
   * Loans not yet returned, oldest first
   */
  openLoansFor(supervisorId: string): Loan[] {
    return loansOfSupervisor(this.store.current(), supervisorId).filter(
      (loan) => loan.status === 'OPEN'
    );
  }

  /**
   * Overdue loans, longest overdue first
   */
  overdueLoans(now: Date = this.store.now()): Loan[] {
    return [...this.store.current().loans.values()]
      .filter((loan) => effectiveLoanStatus(loan, now) === 'OVERDUE')
      .sort(compareDue);
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private async issueMany(
    ctx: ServiceContext,
    input: IssueBatchInput
  ): Promise<Result<Loan[], LoanFailure>> {
    const location = optionalText(input.location);
    const notes = optionalText(input.notes);

    const issued = await this.store.mutate<Loan[], LoanError | EquipmentError | AuthError>(
      (state, now) => {
        const allowed = requireCapability(state, ctx, 'loan.issue');
        if (!allowed.success) {
          return allowed;
        }

        const supervisor = activeSupervisor(state, input.supervisorId);
        if (!supervisor) {
          return err(LoanErrors.SUPERVISOR_NOT_FOUND(input.supervisorId));
        }

        for (const equipmentId of input.equipmentIds) {
          const equipment = state.equipment.get(equipmentId);
          if (!equipment) {
            return err(EquipmentErrors.NOT_FOUND(equipmentId));
          }
          if (equipment.status !== 'AVAILABLE') {
            return err(LoanErrors.EQUIPMENT_UNAVAILABLE(equipmentId, equipment.status));
          }
        }

        const limit = supervisor.max_concurrent_loans ?? this.config.defaultLoanLimit;
        const open = activeLoanCount(state, supervisor.id);
        if (open + input.equipmentIds.length > limit) {
          return err(LoanErrors.LIMIT_EXCEEDED(supervisor.id, limit, open, input.equipmentIds.length));
        }

        const draft = new StateDraft(state);
        const issuedAt = now.toISOString();
        const dueAt = new Date(now.getTime() + this.config.loanPeriodDays * DAY_MS).toISOString();
        const loans: Loan[] = [];
        const audit: AuditDraft[] = [];

        for (const equipmentId of input.equipmentIds) {
          const loan: Loan = {
            id: crypto.randomUUID(),
            equipment_id: equipmentId,
            supervisor_id: supervisor.id,
            issued_by: ctx.userId,
            issued_at: issuedAt,
            due_at: dueAt,
            returned_at: null,
            returned_by: null,
            status: 'OPEN',
            location,
            notes,
          };
          draft.putLoan(loan);

          const moved = applyEquipmentTransition(draft, {
            equipmentId,
            target: 'LOANED',
            origin: 'loan',
            actorId: ctx.userId,
            now,
            location,
            details: { loan_id: loan.id },
          });
          if (!moved.success) {
            return moved;
          }

          loans.push(loan);
          audit.push(
            {
              actor_id: ctx.userId,
              operation: 'loan.issue',
              entity_type: 'loan',
              entity_id: loan.id,
              before_status: null,
              after_status: 'OPEN',
              details: {
                equipment_id: equipmentId,
                supervisor_id: supervisor.id,
                due_at: dueAt,
                ...(location ? { location } : {}),
              },
            },
            moved.data.audit
          );
        }

        return commit(draft.finish(), audit, loans);
      }
    );

    if (issued.success) {
      logInfo('Loans issued', {
        supervisor_id: input.supervisorId,
        loan_ids: issued.data.map((loan) => loan.id),
      });
    }
    return issued;
  }
}

function activeSupervisor(state: LedgerState, supervisorId: string): User | undefined {
  const user = state.users.get(supervisorId);
  if (!user || user.role !== 'SUPERVISOR' || !user.is_active) {
    return undefined;
  }
  return user;
}

function compareDue(a: Loan, b: Loan): number {
  if (a.due_at !== b.due_at) {
    return a.due_at < b.due_at ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
