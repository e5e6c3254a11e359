/**
 * Domain Layer Exports
 */

// Services
export { IdentityService, toPublicUser } from './identity.service';
export type {
  CreateUserInput,
  BootstrapAdministratorInput,
  ChangeRoleInput,
  SupervisorProfileInput,
  AuthSession,
  SupervisorSummary,
  ListSupervisorsFilter,
} from './identity.service';

export { EquipmentService, EQUIPMENT_TRANSITIONS, applyEquipmentTransition } from './equipment.service';
export type {
  RegisterEquipmentInput,
  UpdateEquipmentInput,
  EquipmentSearch,
  TransitionRequest,
  AppliedTransition,
} from './equipment.service';

export { LoanService, effectiveLoanStatus } from './loan.service';
export type { IssueLoanInput, IssueBatchInput, ReturnLoanOptions } from './loan.service';

export { AuditTrail } from './audit.service';
export type { AuditQuery } from './audit.service';

export { SnapshotService } from './snapshot.service';

export { StatisticsService } from './statistics.service';
export type { SupervisorLoanCounts, RecentActivityQuery, LedgerSummary } from './statistics.service';

// Store
export { LedgerStore } from './ledger.store';
export type { LedgerState } from './ledger.state';
export { SNAPSHOT_FORMAT, SNAPSHOT_SCHEMA_VERSION } from './ledger.schema';

// Permissions
export { CAPABILITIES, roleAllows, requireCapability } from './permissions';
export type { Capability } from './permissions';
