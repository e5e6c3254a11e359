/**
 * Committed ledger state
 *
 * A LedgerState value is never modified after construction. Mutations build
 * the next value through a StateDraft and the store swaps the reference, so a
 * reader holding a state always sees one consistent revision.
 */

import type { Equipment, Loan, User } from '../types/records';
import type { PersistedLedger } from './ledger.schema';

export interface LedgerState {
  /** Bumped by restore; selects which audit batches belong to this state */
  readonly generation: number;
  /** Bumped by every commit */
  readonly revision: number;
  /** Last audit sequence committed together with this state */
  readonly auditSequence: number;
  readonly equipment: ReadonlyMap<string, Equipment>;
  readonly loans: ReadonlyMap<string, Loan>;
  readonly users: ReadonlyMap<string, User>;
  /** qr_code → equipment id */
  readonly codeIndex: ReadonlyMap<string, string>;
  /** equipment id → loan ids, oldest first */
  readonly loansByEquipment: ReadonlyMap<string, readonly string[]>;
  /** supervisor id → loan ids, oldest first */
  readonly loansBySupervisor: ReadonlyMap<string, readonly string[]>;
}

export function emptyState(): LedgerState {
  return createState({
    generation: 0,
    revision: 0,
    audit_sequence: 0,
    equipment: [],
    loans: [],
    users: [],
  });
}

export function createState(doc: PersistedLedger): LedgerState {
  const equipment = new Map(doc.equipment.map((item) => [item.id, item] as const));
  const codeIndex = new Map(doc.equipment.map((item) => [item.qr_code, item.id] as const));
  const users = new Map(doc.users.map((user) => [user.id, user] as const));

  const sortedLoans = [...doc.loans].sort(compareIssued);
  const loans = new Map(sortedLoans.map((loan) => [loan.id, loan] as const));
  const loansByEquipment = new Map<string, readonly string[]>();
  const loansBySupervisor = new Map<string, readonly string[]>();
  for (const loan of sortedLoans) {
    appendIndex(loansByEquipment, loan.equipment_id, loan.id);
    appendIndex(loansBySupervisor, loan.supervisor_id, loan.id);
  }

  return {
    generation: doc.generation,
    revision: doc.revision,
    auditSequence: doc.audit_sequence,
    equipment,
    loans,
    users,
    codeIndex,
    loansByEquipment,
    loansBySupervisor,
  };
}

export function serializeState(state: LedgerState): PersistedLedger {
  return {
    generation: state.generation,
    revision: state.revision,
    audit_sequence: state.auditSequence,
    equipment: [...state.equipment.values()],
    loans: [...state.loans.values()],
    users: [...state.users.values()],
  };
}

// ============================================
// QUERIES OVER A STATE
// ============================================

export function loansOfSupervisor(state: LedgerState, supervisorId: string): Loan[] {
  return resolveLoans(state, state.loansBySupervisor.get(supervisorId));
}

export function loansOfEquipment(state: LedgerState, equipmentId: string): Loan[] {
  return resolveLoans(state, state.loansByEquipment.get(equipmentId));
}

/** Open loans, i.e. effective status OPEN or OVERDUE */
export function activeLoanCount(state: LedgerState, supervisorId: string): number {
  return loansOfSupervisor(state, supervisorId).filter((loan) => loan.status === 'OPEN').length;
}

export function openLoanOf(state: LedgerState, equipmentId: string): Loan | undefined {
  return loansOfEquipment(state, equipmentId).find((loan) => loan.status === 'OPEN');
}

// ============================================
// DRAFTS
// ============================================

/**
 * Copy-on-write builder for the next state. Reads see the draft's own
 * writes; the base state is left untouched.
 */
export class StateDraft {
  private equipment: Map<string, Equipment> | null = null;
  private loans: Map<string, Loan> | null = null;
  private users: Map<string, User> | null = null;
  private codeIndex: Map<string, string> | null = null;
  private loansByEquipment: Map<string, readonly string[]> | null = null;
  private loansBySupervisor: Map<string, readonly string[]> | null = null;

  constructor(readonly base: LedgerState) {}

  getEquipment(id: string): Equipment | undefined {
    return (this.equipment ?? this.base.equipment).get(id);
  }

  equipmentIdForCode(qrCode: string): string | undefined {
    return (this.codeIndex ?? this.base.codeIndex).get(qrCode);
  }

  getLoan(id: string): Loan | undefined {
    return (this.loans ?? this.base.loans).get(id);
  }

  getUser(id: string): User | undefined {
    return (this.users ?? this.base.users).get(id);
  }

  allUsers(): User[] {
    return [...(this.users ?? this.base.users).values()];
  }

  loansOfSupervisor(supervisorId: string): Loan[] {
    const ids = (this.loansBySupervisor ?? this.base.loansBySupervisor).get(supervisorId) ?? [];
    return this.resolve(ids);
  }

  loansOfEquipment(equipmentId: string): Loan[] {
    const ids = (this.loansByEquipment ?? this.base.loansByEquipment).get(equipmentId) ?? [];
    return this.resolve(ids);
  }

  putEquipment(item: Equipment): void {
    const equipment = this.equipment || (this.equipment = new Map(this.base.equipment));
    if (!equipment.has(item.id)) {
      const codeIndex = this.codeIndex || (this.codeIndex = new Map(this.base.codeIndex));
      codeIndex.set(item.qr_code, item.id);
    }
    equipment.set(item.id, item);
  }

  putLoan(loan: Loan): void {
    const loans = this.loans || (this.loans = new Map(this.base.loans));
    if (!loans.has(loan.id)) {
      const byEquipment =
        this.loansByEquipment || (this.loansByEquipment = new Map(this.base.loansByEquipment));
      const bySupervisor =
        this.loansBySupervisor || (this.loansBySupervisor = new Map(this.base.loansBySupervisor));
      appendIndex(byEquipment, loan.equipment_id, loan.id);
      appendIndex(bySupervisor, loan.supervisor_id, loan.id);
    }
    loans.set(loan.id, loan);
  }

  putUser(user: User): void {
    const users = this.users || (this.users = new Map(this.base.users));
    users.set(user.id, user);
  }

  finish(): LedgerState {
    return {
      generation: this.base.generation,
      revision: this.base.revision + 1,
      auditSequence: this.base.auditSequence,
      equipment: this.equipment ?? this.base.equipment,
      loans: this.loans ?? this.base.loans,
      users: this.users ?? this.base.users,
      codeIndex: this.codeIndex ?? this.base.codeIndex,
      loansByEquipment: this.loansByEquipment ?? this.base.loansByEquipment,
      loansBySupervisor: this.loansBySupervisor ?? this.base.loansBySupervisor,
    };
  }

  private resolve(ids: readonly string[]): Loan[] {
    const loans: Loan[] = [];
    for (const id of ids) {
      const loan = this.getLoan(id);
      if (loan) {
        loans.push(loan);
      }
    }
    return loans;
  }
}

function resolveLoans(state: LedgerState, ids: readonly string[] | undefined): Loan[] {
  const loans: Loan[] = [];
  for (const id of ids ?? []) {
    const loan = state.loans.get(id);
    if (loan) {
      loans.push(loan);
    }
  }
  return loans;
}

function appendIndex(index: Map<string, readonly string[]>, key: string, id: string): void {
  index.set(key, [...(index.get(key) ?? []), id]);
}

function compareIssued(a: Loan, b: Loan): number {
  if (a.issued_at !== b.issued_at) {
    return a.issued_at < b.issued_at ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
