/**
 * Ledger record types
 *
 * Persisted records use snake_case fields, service inputs use camelCase.
 */

// ============================================
// ENUMS
// ============================================

export type UserRole = 'ADMINISTRATOR' | 'SUPERVISOR' | 'TECHNICIAN';

export const USER_ROLES: readonly UserRole[] = ['ADMINISTRATOR', 'SUPERVISOR', 'TECHNICIAN'];

export type EquipmentStatus = 'AVAILABLE' | 'LOANED' | 'MAINTENANCE' | 'RETIRED';

export const EQUIPMENT_STATUSES: readonly EquipmentStatus[] = [
  'AVAILABLE',
  'LOANED',
  'MAINTENANCE',
  'RETIRED',
];

/** Status as stored. OVERDUE is never stored, see LoanStatus */
export type StoredLoanStatus = 'OPEN' | 'RETURNED';

export type LoanStatus = StoredLoanStatus | 'OVERDUE';

export type AuditOperation =
  | 'equipment.register'
  | 'equipment.transition'
  | 'equipment.update'
  | 'loan.issue'
  | 'loan.return'
  | 'loan.relocate'
  | 'user.create'
  | 'user.role_change'
  | 'user.deactivate'
  | 'user.limit_change'
  | 'user.profile_update'
  | 'user.login'
  | 'user.login_failed'
  | 'snapshot.restore';

export type AuditEntityType = 'equipment' | 'loan' | 'user' | 'ledger';

// ============================================
// CORE RECORDS
// ============================================

export interface Equipment {
  id: string;
  qr_code: string;
  name: string;
  category: string | null;
  location: string;
  notes: string | null;
  status: EquipmentStatus;
  created_at: string;
  updated_at: string;
}

export interface User {
  id: string;
  username: string;
  full_name: string;
  role: UserRole;
  password_hash: string;
  is_active: boolean;
  failed_attempts: number;
  locked_until: string | null;
  last_login_at: string | null;
  /** Required while role is SUPERVISOR */
  max_concurrent_loans: number | null;
  phone: string | null;
  email: string | null;
  department: string | null;
  created_at: string;
  updated_at: string;
}

/** User as handed out of the identity store: no credential material */
export type PublicUser = Omit<User, 'password_hash'>;

export interface Loan {
  id: string;
  equipment_id: string;
  supervisor_id: string;
  issued_by: string;
  issued_at: string;
  due_at: string;
  returned_at: string | null;
  returned_by: string | null;
  status: StoredLoanStatus;
  location: string | null;
  notes: string | null;
}

export interface AuditEntry {
  sequence: number;
  timestamp: string;
  actor_id: string;
  operation: AuditOperation;
  entity_type: AuditEntityType;
  entity_id: string;
  before_status: string | null;
  after_status: string | null;
  details: Record<string, unknown>;
}

/** AuditEntry before the trail assigns its sequence and timestamp */
export type AuditDraft = Omit<AuditEntry, 'sequence' | 'timestamp'>;

// ============================================
// SNAPSHOTS
// ============================================

export interface SnapshotHandle {
  id: string;
  created_at: string;
  schema_version: number;
  revision: number;
  equipment_count: number;
  loan_count: number;
  audit_count: number;
}
