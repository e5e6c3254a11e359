/**
 * Domain Error Types
 *
 * Every error carries a specific `code` and one of the ledger's error `kind`s,
 * which is what callers branch on.
 */

export type ErrorKind =
  | 'NotFound'
  | 'DuplicateCode'
  | 'InvalidTransition'
  | 'Unauthorized'
  | 'AuthFailed'
  | 'EquipmentUnavailable'
  | 'LimitExceeded'
  | 'AlreadyReturned'
  | 'StorageUnavailable'
  | 'SnapshotFailed'
  | 'IncompatibleSnapshot'
  | 'ValidationFailed';

/**
 * Base domain error class with structured error information
 */
export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ErrorKind,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================
// AUTH ERRORS
// ============================================

export class AuthError extends DomainError {
  constructor(message: string, code: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message, code, kind, context);
    this.name = 'AuthError';
  }
}

export const AuthErrors = {
  // Deliberately the same message for every login failure
  AUTH_FAILED: (reason: 'unknown_user' | 'inactive' | 'bad_secret') =>
    new AuthError('Invalid username or password', 'AUTH_FAILED', 'AuthFailed', { reason }),

  ACCOUNT_LOCKED: (until: string) =>
    new AuthError('Account is locked', 'AUTH_ACCOUNT_LOCKED', 'AuthFailed', { locked_until: until }),

  UNAUTHORIZED: (capability: string, role: string | null) =>
    new AuthError('Insufficient permissions', 'AUTH_INSUFFICIENT_PERMISSIONS', 'Unauthorized', {
      capability,
      role,
    }),

  INACTIVE_ACTOR: (userId: string) =>
    new AuthError('Acting user is not active', 'AUTH_INACTIVE_ACTOR', 'Unauthorized', {
      user_id: userId,
    }),

  USER_NOT_FOUND: (userId: string) =>
    new AuthError('User not found', 'AUTH_USER_NOT_FOUND', 'NotFound', { user_id: userId }),

  USERNAME_TAKEN: (username: string) =>
    new AuthError('Username is already taken', 'AUTH_USERNAME_TAKEN', 'ValidationFailed', { username }),

  LAST_ADMINISTRATOR: (userId: string) =>
    new AuthError('Cannot remove the last active administrator', 'AUTH_LAST_ADMINISTRATOR', 'ValidationFailed', {
      user_id: userId,
    }),

  ALREADY_BOOTSTRAPPED: () =>
    new AuthError('Users already exist', 'AUTH_ALREADY_BOOTSTRAPPED', 'ValidationFailed'),
};

// ============================================
// EQUIPMENT ERRORS
// ============================================

export class EquipmentError extends DomainError {
  constructor(message: string, code: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message, code, kind, context);
    this.name = 'EquipmentError';
  }
}

export const EquipmentErrors = {
  NOT_FOUND: (equipmentId: string) =>
    new EquipmentError('Equipment not found', 'EQUIPMENT_NOT_FOUND', 'NotFound', {
      equipment_id: equipmentId,
    }),

  CODE_NOT_FOUND: (qrCode: string) =>
    new EquipmentError('No equipment with this code', 'EQUIPMENT_CODE_NOT_FOUND', 'NotFound', {
      qr_code: qrCode,
    }),

  DUPLICATE_CODE: (qrCode: string) =>
    new EquipmentError('Code is already assigned', 'EQUIPMENT_DUPLICATE_CODE', 'DuplicateCode', {
      qr_code: qrCode,
    }),

  INVALID_CODE: (qrCode: string) =>
    new EquipmentError(
      'Code must be at least 5 characters of uppercase letters, digits and hyphens',
      'EQUIPMENT_INVALID_CODE',
      'ValidationFailed',
      { qr_code: qrCode }
    ),

  INVALID_TRANSITION: (from: string, to: string) =>
    new EquipmentError('Invalid status transition', 'EQUIPMENT_INVALID_TRANSITION', 'InvalidTransition', {
      from,
      to,
    }),

  RESERVED_TRANSITION: (from: string, to: string) =>
    new EquipmentError(
      'Loan status changes go through the loan ledger',
      'EQUIPMENT_LOAN_DRIVEN_TRANSITION',
      'InvalidTransition',
      { from, to }
    ),

  RETIRED: (equipmentId: string) =>
    new EquipmentError('Equipment is retired', 'EQUIPMENT_RETIRED', 'InvalidTransition', {
      equipment_id: equipmentId,
    }),
};

// ============================================
// LOAN ERRORS
// ============================================

export class LoanError extends DomainError {
  constructor(message: string, code: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message, code, kind, context);
    this.name = 'LoanError';
  }
}

export const LoanErrors = {
  NOT_FOUND: (loanId: string) =>
    new LoanError('Loan not found', 'LOAN_NOT_FOUND', 'NotFound', { loan_id: loanId }),

  NO_OPEN_LOAN: (equipmentId: string) =>
    new LoanError('Equipment has no open loan', 'LOAN_NONE_OPEN', 'NotFound', {
      equipment_id: equipmentId,
    }),

  SUPERVISOR_NOT_FOUND: (supervisorId: string) =>
    new LoanError('Active supervisor not found', 'LOAN_SUPERVISOR_NOT_FOUND', 'NotFound', {
      supervisor_id: supervisorId,
    }),

  EQUIPMENT_UNAVAILABLE: (equipmentId: string, status: string) =>
    new LoanError('Equipment is not available', 'LOAN_EQUIPMENT_UNAVAILABLE', 'EquipmentUnavailable', {
      equipment_id: equipmentId,
      status,
    }),

  LIMIT_EXCEEDED: (supervisorId: string, limit: number, open: number, requested: number) =>
    new LoanError('Supervisor has reached the loan limit', 'LOAN_LIMIT_EXCEEDED', 'LimitExceeded', {
      supervisor_id: supervisorId,
      limit,
      open,
      requested,
    }),

  ALREADY_RETURNED: (loanId: string, returnedAt: string | null) =>
    new LoanError('Loan was already returned', 'LOAN_ALREADY_RETURNED', 'AlreadyReturned', {
      loan_id: loanId,
      returned_at: returnedAt,
    }),
};

// ============================================
// STORAGE / SNAPSHOT ERRORS
// ============================================

export class StorageError extends DomainError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, 'StorageUnavailable', context);
    this.name = 'StorageError';
  }
}

export const StorageErrors = {
  UNAVAILABLE: (operation: string, cause: unknown) =>
    new StorageError('Storage is unavailable', 'STORAGE_UNAVAILABLE', {
      operation,
      cause: describeCause(cause),
    }),

  AUDIT_WRITE_FAILED: (cause: unknown) =>
    new StorageError('Audit write failed; operation was not committed', 'STORAGE_AUDIT_WRITE_FAILED', {
      cause: describeCause(cause),
    }),

  CORRUPT_STATE: (key: string, detail: string) =>
    new StorageError('Persisted ledger state is unreadable', 'STORAGE_CORRUPT_STATE', { key, detail }),
};

export class SnapshotError extends DomainError {
  constructor(message: string, code: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message, code, kind, context);
    this.name = 'SnapshotError';
  }
}

export const SnapshotErrors = {
  WRITE_FAILED: (cause: unknown) =>
    new SnapshotError('Snapshot could not be written', 'SNAPSHOT_WRITE_FAILED', 'SnapshotFailed', {
      cause: describeCause(cause),
    }),

  TIMED_OUT: (timeoutMs: number) =>
    new SnapshotError('Snapshot write timed out', 'SNAPSHOT_TIMEOUT', 'SnapshotFailed', {
      timeout_ms: timeoutMs,
    }),

  READ_FAILED: (snapshotId: string, cause: unknown) =>
    new SnapshotError('Snapshot could not be read', 'SNAPSHOT_READ_FAILED', 'SnapshotFailed', {
      snapshot_id: snapshotId,
      cause: describeCause(cause),
    }),

  INCOMPATIBLE: (snapshotId: string, detail: string) =>
    new SnapshotError('Snapshot is not compatible with this ledger', 'SNAPSHOT_INCOMPATIBLE', 'IncompatibleSnapshot', {
      snapshot_id: snapshotId,
      detail,
    }),
};

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends DomainError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 'ValidationFailed', context);
    this.name = 'ValidationError';
  }
}

export const ValidationErrors = {
  REQUIRED_FIELD: (field: string) =>
    new ValidationError(`${field} is required`, { field }),

  INVALID_FORMAT: (field: string, expected: string) =>
    new ValidationError(`Invalid format for ${field}`, { field, expected }),

  OUT_OF_RANGE: (field: string, min?: number, max?: number) =>
    new ValidationError(`${field} is out of valid range`, { field, min, max }),

  DUPLICATE_ITEMS: (field: string, values: string[]) =>
    new ValidationError(`${field} contains duplicates`, { field, values }),

  INVALID_CONFIG: (issues: Record<string, string>) =>
    new ValidationError('Invalid ledger configuration', { issues }),
};

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
