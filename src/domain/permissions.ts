/**
 * Capability table: which roles may perform which ledger operations.
 * Checked before every mutator.
 */

import type { User, UserRole } from '../types/records';
import { AuthError, AuthErrors } from '../types/errors';
import { ActorContext, Result, isSystemContext, ok, err } from '../types/context';
import type { LedgerState } from './ledger.state';

export type Capability =
  | 'equipment.register'
  | 'equipment.update'
  | 'equipment.maintain'
  | 'equipment.retire'
  | 'loan.issue'
  | 'loan.return'
  | 'user.manage'
  | 'snapshot.create'
  | 'snapshot.restore';

export const CAPABILITIES: Record<Capability, readonly UserRole[]> = {
  'equipment.register': ['ADMINISTRATOR'],
  'equipment.update': ['ADMINISTRATOR', 'TECHNICIAN'],
  'equipment.maintain': ['ADMINISTRATOR', 'TECHNICIAN'],
  'equipment.retire': ['ADMINISTRATOR'],
  'loan.issue': ['ADMINISTRATOR', 'SUPERVISOR'],
  'loan.return': ['ADMINISTRATOR', 'SUPERVISOR'],
  'user.manage': ['ADMINISTRATOR'],
  'snapshot.create': ['ADMINISTRATOR'],
  'snapshot.restore': ['ADMINISTRATOR'],
};

/** Capabilities a system context may exercise without a user */
export const SYSTEM_CAPABILITIES: readonly Capability[] = ['snapshot.create'];

export function roleAllows(role: UserRole, capability: Capability): boolean {
  return CAPABILITIES[capability].includes(role);
}

/**
 * Check an actor against the capability table using the stored role, not
 * the role the caller claims.
 */
export function requireCapability(
  state: LedgerState,
  ctx: ActorContext,
  capability: Capability
): Result<User | null, AuthError> {
  if (isSystemContext(ctx)) {
    return SYSTEM_CAPABILITIES.includes(capability)
      ? ok(null)
      : err(AuthErrors.UNAUTHORIZED(capability, null));
  }

  const actor = state.users.get(ctx.userId);
  if (!actor) {
    return err(AuthErrors.UNAUTHORIZED(capability, null));
  }

  if (!actor.is_active) {
    return err(AuthErrors.INACTIVE_ACTOR(actor.id));
  }

  if (!roleAllows(actor.role, capability)) {
    return err(AuthErrors.UNAUTHORIZED(capability, actor.role));
  }

  return ok(actor);
}
