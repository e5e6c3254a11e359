/**
 * Statistics Service
 *
 * Read-only aggregates over the committed state and the audit trail.
 * Everything is recomputed per call; nothing here is persisted.
 */

import type { AuditEntry, EquipmentStatus, Loan } from '../types/records';
import { EQUIPMENT_STATUSES } from '../types/records';
import type { LedgerConfig } from '../lib/config';
import type { LedgerStore } from './ledger.store';
import { loansOfSupervisor } from './ledger.state';
import { effectiveLoanStatus } from './loan.service';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// TYPES
// ============================================

export interface SupervisorLoanCounts {
  supervisor_id: string;
  full_name: string;
  department: string | null;
  /** Open and not yet due */
  open: number;
  overdue: number;
  /** open + overdue; what the limit is checked against */
  active: number;
  limit: number;
}

export interface RecentActivityQuery {
  windowMs: number;
  limit?: number;
}

export interface LedgerSummary {
  generated_at: string;
  equipment: Record<EquipmentStatus, number>;
  total_equipment: number;
  active_loans: number;
  overdue_loans: number;
  loans_issued_today: number;
  supervisors_with_loans: number;
  /** Open loans older than the configured alert threshold, oldest first */
  long_running_loans: Loan[];
}

// ============================================
// STATISTICS SERVICE
// ============================================

export class StatisticsService {
  constructor(
    private store: LedgerStore,
    private config: LedgerConfig
  ) {}

  equipmentStatusCounts(): Record<EquipmentStatus, number> {
    const counts: Record<EquipmentStatus, number> = {
      AVAILABLE: 0,
      LOANED: 0,
      MAINTENANCE: 0,
      RETIRED: 0,
    };
    for (const item of this.store.current().equipment.values()) {
      counts[item.status] += 1;
    }
    return counts;
  }

  /**
   * Per-supervisor loan counts. Includes every active supervisor and any
   * inactive one still holding loans.
   */
  loanCountsBySupervisor(now: Date = this.store.now()): SupervisorLoanCounts[] {
    const state = this.store.current();
    const rows: SupervisorLoanCounts[] = [];

    for (const user of state.users.values()) {
      if (user.role !== 'SUPERVISOR') {
        continue;
      }

      let open = 0;
      let overdue = 0;
      for (const loan of loansOfSupervisor(state, user.id)) {
        const status = effectiveLoanStatus(loan, now);
        if (status === 'OPEN') open += 1;
        if (status === 'OVERDUE') overdue += 1;
      }

      if (!user.is_active && open + overdue === 0) {
        continue;
      }

      rows.push({
        supervisor_id: user.id,
        full_name: user.full_name,
        department: user.department,
        open,
        overdue,
        active: open + overdue,
        limit: user.max_concurrent_loans ?? this.config.defaultLoanLimit,
      });
    }

    return rows.sort((a, b) => a.full_name.localeCompare(b.full_name));
  }

  /**
   * Audit entries inside the window, newest first
   */
  recentActivity(query: RecentActivityQuery, now: Date = this.store.now()): AuditEntry[] {
    const from = new Date(now.getTime() - query.windowMs);
    const entries = [...this.store.audit.query({ from, to: now })].reverse();
    return query.limit === undefined ? entries : entries.slice(0, query.limit);
  }

  summary(now: Date = this.store.now()): LedgerSummary {
    const state = this.store.current();
    const equipment = this.equipmentStatusCounts();
    const today = this.siteDay(now);
    const alertDays = this.config.longLoanAlertDays;
    const longRunningBefore =
      alertDays === null ? null : new Date(now.getTime() - alertDays * DAY_MS).toISOString();

    let activeLoans = 0;
    let overdueLoans = 0;
    let issuedToday = 0;
    const supervisors = new Set<string>();
    const longRunning: Loan[] = [];

    for (const loan of state.loans.values()) {
      if (this.siteDay(new Date(loan.issued_at)) === today) {
        issuedToday += 1;
      }

      const status = effectiveLoanStatus(loan, now);
      if (status === 'RETURNED') {
        continue;
      }

      activeLoans += 1;
      supervisors.add(loan.supervisor_id);
      if (status === 'OVERDUE') {
        overdueLoans += 1;
      }
      if (longRunningBefore !== null && loan.issued_at <= longRunningBefore) {
        longRunning.push(loan);
      }
    }

    return {
      generated_at: now.toISOString(),
      equipment,
      total_equipment: EQUIPMENT_STATUSES.reduce((sum, status) => sum + equipment[status], 0),
      active_loans: activeLoans,
      overdue_loans: overdueLoans,
      loans_issued_today: issuedToday,
      supervisors_with_loans: supervisors.size,
      long_running_loans: longRunning,
    };
  }

  /** Calendar day at the site, YYYY-MM-DD */
  private siteDay(at: Date): string {
    const shifted = new Date(at.getTime() + this.config.utcOffsetMinutes * 60 * 1000);
    return shifted.toISOString().slice(0, 10);
  }
}
