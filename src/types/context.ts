/**
 * Service Context Types
 *
 * Every mutating operation records who performed it, so every operation
 * receives the acting context.
 */

import type { UserRole } from './records';

/**
 * Context passed to domain operations on behalf of an authenticated user
 */
export interface ServiceContext {
  /** Current authenticated user ID */
  userId: string;

  /** Role at authentication time; authorization re-reads the stored role */
  userRole: UserRole;

  /** Session the call belongs to, if the caller tracks one */
  sessionId?: string;
}

/**
 * Context for system operations (scheduled backups, first-run bootstrap)
 */
export interface SystemContext {
  /** System identifier */
  systemId: 'scheduler' | 'bootstrap' | 'maintenance';

  /** Reason for system operation */
  reason: string;
}

export type ActorContext = ServiceContext | SystemContext;

export function isSystemContext(ctx: ActorContext): ctx is SystemContext {
  return 'systemId' in ctx;
}

/**
 * Identifier written to the audit trail for an actor
 */
export function actorIdOf(ctx: ActorContext): string {
  return isSystemContext(ctx) ? `system:${ctx.systemId}` : ctx.userId;
}

/**
 * Result wrapper for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failure result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
