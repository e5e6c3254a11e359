/**
 * Identity & Role Service
 *
 * Handles:
 * - Username + password authentication with lockout after repeated failures
 * - Capability checks for every ledger mutator
 * - User administration (create, role change, deactivate)
 * - Supervisor loan limits and contact profiles
 *
 * Raw secrets are hashed before they reach the store and are never logged.
 */

import * as crypto from 'crypto';
import type { AuditDraft, PublicUser, User, UserRole } from '../types/records';
import {
  AuthError,
  AuthErrors,
  StorageError,
  ValidationError,
  ValidationErrors,
} from '../types/errors';
import {
  ActorContext,
  ServiceContext,
  SystemContext,
  Result,
  actorIdOf,
  ok,
  err,
} from '../types/context';
import type { LedgerConfig } from '../lib/config';
import type { CredentialHasher } from '../lib/credentials';
import {
  isNonEmptyString,
  isPositiveInt,
  isValidEmail,
  isValidPhone,
  isValidUsername,
  optionalText,
} from '../lib/validation';
import { logInfo, logWarning } from '../lib/logger';
import { LedgerStore, commit } from './ledger.store';
import { LedgerState, StateDraft, activeLoanCount } from './ledger.state';
import { Capability, requireCapability } from './permissions';

// ============================================
// TYPES
// ============================================

export interface CreateUserInput {
  username: string;
  fullName: string;
  password: string;
  role: UserRole;
  /** Supervisors only; falls back to the configured default */
  maxConcurrentLoans?: number;
  phone?: string;
  email?: string;
  department?: string;
}

export interface BootstrapAdministratorInput {
  username: string;
  fullName: string;
  password: string;
}

export interface ChangeRoleInput {
  role: UserRole;
  /** Used when the new role is SUPERVISOR */
  maxConcurrentLoans?: number;
}

export interface SupervisorProfileInput {
  fullName?: string;
  phone?: string | null;
  email?: string | null;
  department?: string | null;
}

export interface AuthSession {
  user: PublicUser;
  context: ServiceContext;
  authenticatedAt: string;
}

export interface SupervisorSummary extends PublicUser {
  active_loans: number;
}

export interface ListSupervisorsFilter {
  department?: string;
  includeInactive?: boolean;
}

type IdentityFailure = AuthError | ValidationError | StorageError;

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, ...rest } = user;
  return rest;
}

// ============================================
// IDENTITY SERVICE
// ============================================

export class IdentityService {
  constructor(
    private store: LedgerStore,
    private hasher: CredentialHasher,
    private config: LedgerConfig
  ) {}

  // ============================================
  // AUTHENTICATION
  // ============================================

  /**
   * Verify a username and secret.
   *
   * Every failure is reported as AuthFailed. Failures against an existing
   * account count towards the lockout and are audited.
   */
  async authenticate(
    username: string,
    secret: string
  ): Promise<Result<AuthSession, AuthError | StorageError>> {
    const user = findByUsername(this.store.current(), username);
    if (!user) {
      return err(AuthErrors.AUTH_FAILED('unknown_user'));
    }

    if (!user.is_active) {
      return err(AuthErrors.AUTH_FAILED('inactive'));
    }

    if (user.locked_until && user.locked_until > this.store.now().toISOString()) {
      return err(AuthErrors.ACCOUNT_LOCKED(user.locked_until));
    }

    const valid = await this.hasher.verify(secret, user.password_hash);

    const outcome = await this.store.mutate<User | null, AuthError>((state, now) => {
      const current = state.users.get(user.id);
      if (!current || !current.is_active) {
        return err(AuthErrors.AUTH_FAILED('inactive'));
      }

      const timestamp = now.toISOString();
      // Attempts verified concurrently are settled here, one at a time
      if (current.locked_until && current.locked_until > timestamp) {
        return err(AuthErrors.ACCOUNT_LOCKED(current.locked_until));
      }
      if (current.password_hash !== user.password_hash) {
        return err(AuthErrors.AUTH_FAILED('bad_secret'));
      }

      const draft = new StateDraft(state);

      if (valid) {
        const updated: User = {
          ...current,
          failed_attempts: 0,
          locked_until: null,
          last_login_at: timestamp,
          updated_at: timestamp,
        };
        draft.putUser(updated);
        return commit(
          draft.finish(),
          [
            {
              actor_id: current.id,
              operation: 'user.login',
              entity_type: 'user',
              entity_id: current.id,
              before_status: null,
              after_status: null,
              details: {},
            },
          ],
          updated
        );
      }

      const failedAttempts = current.failed_attempts + 1;
      const locked = failedAttempts >= this.config.maxLoginAttempts;
      const lockedUntil = locked
        ? new Date(now.getTime() + this.config.lockoutMinutes * 60 * 1000).toISOString()
        : null;

      draft.putUser({
        ...current,
        failed_attempts: locked ? 0 : failedAttempts,
        locked_until: lockedUntil ?? current.locked_until,
        updated_at: timestamp,
      });

      return commit(
        draft.finish(),
        [
          {
            actor_id: current.id,
            operation: 'user.login_failed',
            entity_type: 'user',
            entity_id: current.id,
            before_status: null,
            after_status: locked ? 'LOCKED' : null,
            details: { failed_attempts: failedAttempts, locked_until: lockedUntil },
          },
        ],
        null
      );
    });

    if (!outcome.success) {
      return outcome;
    }

    if (!outcome.data) {
      logWarning('Failed login', { user_id: user.id });
      return err(AuthErrors.AUTH_FAILED('bad_secret'));
    }

    const authenticated = outcome.data;
    return ok({
      user: toPublicUser(authenticated),
      context: {
        userId: authenticated.id,
        userRole: authenticated.role,
        sessionId: crypto.randomUUID(),
      },
      authenticatedAt: authenticated.last_login_at ?? this.store.now().toISOString(),
    });
  }

  /**
   * Pure role check against the current state. Unknown and inactive users
   * are never authorized.
   */
  authorize(userId: string, required: UserRole | readonly UserRole[]): boolean {
    const user = this.store.current().users.get(userId);
    if (!user || !user.is_active) {
      return false;
    }
    const roles: readonly UserRole[] = typeof required === 'string' ? [required] : required;
    return roles.includes(user.role);
  }

  authorizeCapability(ctx: ActorContext, capability: Capability): Result<User | null, AuthError> {
    return requireCapability(this.store.current(), ctx, capability);
  }

  // ============================================
  // ADMINISTRATION
  // ============================================

  /**
   * Create the first administrator. Only allowed while the store has no users.
   */
  async bootstrapAdministrator(
    system: SystemContext,
    input: BootstrapAdministratorInput
  ): Promise<Result<PublicUser, IdentityFailure>> {
    const invalid = this.validateNewUser({ ...input, role: 'ADMINISTRATOR' });
    if (invalid) {
      return err(invalid);
    }

    const passwordHash = await this.hasher.hash(input.password);

    const created = await this.store.mutate<User, AuthError>((state, now) => {
      if (state.users.size > 0) {
        return err(AuthErrors.ALREADY_BOOTSTRAPPED());
      }

      const user = this.buildUser({ ...input, role: 'ADMINISTRATOR' }, passwordHash, now, null);
      const draft = new StateDraft(state);
      draft.putUser(user);
      return commit(
        draft.finish(),
        [userCreatedEntry(actorIdOf(system), user, { bootstrap: true })],
        user
      );
    });

    if (!created.success) {
      return created;
    }

    logInfo('Administrator bootstrapped', { user_id: created.data.id });
    return ok(toPublicUser(created.data));
  }

  async createUser(
    ctx: ServiceContext,
    input: CreateUserInput
  ): Promise<Result<PublicUser, IdentityFailure>> {
    const invalid = this.validateNewUser(input);
    if (invalid) {
      return err(invalid);
    }

    const passwordHash = await this.hasher.hash(input.password);

    const created = await this.store.mutate<User, AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'user.manage');
      if (!allowed.success) {
        return allowed;
      }

      if (findByUsername(state, input.username)) {
        return err(AuthErrors.USERNAME_TAKEN(input.username.trim()));
      }

      const limit =
        input.role === 'SUPERVISOR'
          ? input.maxConcurrentLoans ?? this.config.defaultLoanLimit
          : null;
      const user = this.buildUser(input, passwordHash, now, limit);
      const draft = new StateDraft(state);
      draft.putUser(user);
      return commit(draft.finish(), [userCreatedEntry(ctx.userId, user, {})], user);
    });

    if (!created.success) {
      return created;
    }

    return ok(toPublicUser(created.data));
  }

  async changeRole(
    ctx: ServiceContext,
    userId: string,
    input: ChangeRoleInput
  ): Promise<Result<PublicUser, IdentityFailure>> {
    if (input.maxConcurrentLoans !== undefined && !isPositiveInt(input.maxConcurrentLoans)) {
      return err(ValidationErrors.OUT_OF_RANGE('maxConcurrentLoans', 1));
    }

    const changed = await this.store.mutate<User, AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'user.manage');
      if (!allowed.success) {
        return allowed;
      }

      const user = state.users.get(userId);
      if (!user) {
        return err(AuthErrors.USER_NOT_FOUND(userId));
      }

      if (
        user.role === 'ADMINISTRATOR' &&
        input.role !== 'ADMINISTRATOR' &&
        user.is_active &&
        activeAdministrators(state) <= 1
      ) {
        return err(AuthErrors.LAST_ADMINISTRATOR(userId));
      }

      // Limits survive a role change so the supervisor keeps their policy
      // if demoted and promoted again
      const limit =
        input.role === 'SUPERVISOR'
          ? input.maxConcurrentLoans ?? user.max_concurrent_loans ?? this.config.defaultLoanLimit
          : user.max_concurrent_loans;

      const updated: User = {
        ...user,
        role: input.role,
        max_concurrent_loans: limit,
        updated_at: now.toISOString(),
      };
      const draft = new StateDraft(state);
      draft.putUser(updated);
      return commit(
        draft.finish(),
        [
          {
            actor_id: ctx.userId,
            operation: 'user.role_change',
            entity_type: 'user',
            entity_id: userId,
            before_status: user.role,
            after_status: input.role,
            details: { max_concurrent_loans: limit },
          },
        ],
        updated
      );
    });

    if (!changed.success) {
      return changed;
    }

    return ok(toPublicUser(changed.data));
  }

  /**
   * Deactivate a user. Open loans held by a deactivated supervisor stay open
   * and can still be returned.
   */
  async deactivate(
    ctx: ServiceContext,
    userId: string
  ): Promise<Result<PublicUser, IdentityFailure>> {
    const deactivated = await this.store.mutate<User, AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'user.manage');
      if (!allowed.success) {
        return allowed;
      }

      const user = state.users.get(userId);
      if (!user) {
        return err(AuthErrors.USER_NOT_FOUND(userId));
      }

      if (user.role === 'ADMINISTRATOR' && user.is_active && activeAdministrators(state) <= 1) {
        return err(AuthErrors.LAST_ADMINISTRATOR(userId));
      }

      const updated: User = { ...user, is_active: false, updated_at: now.toISOString() };
      const draft = new StateDraft(state);
      draft.putUser(updated);
      return commit(
        draft.finish(),
        [
          {
            actor_id: ctx.userId,
            operation: 'user.deactivate',
            entity_type: 'user',
            entity_id: userId,
            before_status: user.is_active ? 'ACTIVE' : 'INACTIVE',
            after_status: 'INACTIVE',
            details: { open_loans: activeLoanCount(state, userId) },
          },
        ],
        updated
      );
    });

    if (!deactivated.success) {
      return deactivated;
    }

    return ok(toPublicUser(deactivated.data));
  }

  /**
   * Set a supervisor's concurrent-loan limit. Only future issuance is
   * affected; loans already open above a lowered limit stay valid.
   */
  async setLoanLimit(
    ctx: ServiceContext,
    supervisorId: string,
    limit: number
  ): Promise<Result<PublicUser, IdentityFailure>> {
    if (!isPositiveInt(limit)) {
      return err(ValidationErrors.OUT_OF_RANGE('maxConcurrentLoans', 1));
    }

    const updatedResult = await this.store.mutate<User, AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'user.manage');
      if (!allowed.success) {
        return allowed;
      }

      const user = state.users.get(supervisorId);
      if (!user || user.role !== 'SUPERVISOR') {
        return err(AuthErrors.USER_NOT_FOUND(supervisorId));
      }

      const updated: User = { ...user, max_concurrent_loans: limit, updated_at: now.toISOString() };
      const draft = new StateDraft(state);
      draft.putUser(updated);
      return commit(
        draft.finish(),
        [
          {
            actor_id: ctx.userId,
            operation: 'user.limit_change',
            entity_type: 'user',
            entity_id: supervisorId,
            before_status: null,
            after_status: null,
            details: {
              previous_limit: user.max_concurrent_loans,
              limit,
              open_loans: activeLoanCount(state, supervisorId),
            },
          },
        ],
        updated
      );
    });

    if (!updatedResult.success) {
      return updatedResult;
    }

    return ok(toPublicUser(updatedResult.data));
  }

  async updateSupervisorProfile(
    ctx: ServiceContext,
    userId: string,
    input: SupervisorProfileInput
  ): Promise<Result<PublicUser, IdentityFailure>> {
    const invalid = validateContact(input);
    if (invalid) {
      return err(invalid);
    }
    if (input.fullName !== undefined && !isNonEmptyString(input.fullName, 2)) {
      return err(ValidationErrors.REQUIRED_FIELD('fullName'));
    }

    const updatedResult = await this.store.mutate<User, AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'user.manage');
      if (!allowed.success) {
        return allowed;
      }

      const user = state.users.get(userId);
      if (!user) {
        return err(AuthErrors.USER_NOT_FOUND(userId));
      }

      const updated: User = {
        ...user,
        full_name: input.fullName !== undefined ? input.fullName.trim() : user.full_name,
        phone: input.phone !== undefined ? optionalText(input.phone) : user.phone,
        email: input.email !== undefined ? optionalText(input.email) : user.email,
        department: input.department !== undefined ? optionalText(input.department) : user.department,
        updated_at: now.toISOString(),
      };
      const draft = new StateDraft(state);
      draft.putUser(updated);
      return commit(
        draft.finish(),
        [
          {
            actor_id: ctx.userId,
            operation: 'user.profile_update',
            entity_type: 'user',
            entity_id: userId,
            before_status: null,
            after_status: null,
            details: { fields: Object.keys(input) },
          },
        ],
        updated
      );
    });

    if (!updatedResult.success) {
      return updatedResult;
    }

    return ok(toPublicUser(updatedResult.data));
  }

  // ============================================
  // QUERIES
  // ============================================

  getUser(userId: string): Result<PublicUser, AuthError> {
    const user = this.store.current().users.get(userId);
    if (!user) {
      return err(AuthErrors.USER_NOT_FOUND(userId));
    }
    return ok(toPublicUser(user));
  }

  /**
   * Supervisors with their current open-loan count, ordered by name
   */
  listSupervisors(filter: ListSupervisorsFilter = {}): SupervisorSummary[] {
    const state = this.store.current();
    const department = filter.department?.trim().toLowerCase();

    return [...state.users.values()]
      .filter((user) => user.role === 'SUPERVISOR')
      .filter((user) => filter.includeInactive || user.is_active)
      .filter((user) => !department || (user.department ?? '').toLowerCase() === department)
      .map((user) => ({ ...toPublicUser(user), active_loans: activeLoanCount(state, user.id) }))
      .sort((a, b) => a.full_name.localeCompare(b.full_name));
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private validateNewUser(input: CreateUserInput): ValidationError | null {
    if (!isValidUsername(input.username.trim())) {
      return ValidationErrors.INVALID_FORMAT('username', '3-32 letters, digits, dots, hyphens or underscores');
    }

    if (!isNonEmptyString(input.fullName, 2)) {
      return ValidationErrors.REQUIRED_FIELD('fullName');
    }

    if (input.password.length < this.config.minPasswordLength) {
      return ValidationErrors.INVALID_FORMAT(
        'password',
        `at least ${this.config.minPasswordLength} characters`
      );
    }

    if (input.maxConcurrentLoans !== undefined && !isPositiveInt(input.maxConcurrentLoans)) {
      return ValidationErrors.OUT_OF_RANGE('maxConcurrentLoans', 1);
    }

    return validateContact(input);
  }

  private buildUser(
    input: CreateUserInput,
    passwordHash: string,
    now: Date,
    limit: number | null
  ): User {
    const timestamp = now.toISOString();
    return {
      id: crypto.randomUUID(),
      username: input.username.trim(),
      full_name: input.fullName.trim(),
      role: input.role,
      password_hash: passwordHash,
      is_active: true,
      failed_attempts: 0,
      locked_until: null,
      last_login_at: null,
      max_concurrent_loans: limit,
      phone: optionalText(input.phone),
      email: optionalText(input.email),
      department: optionalText(input.department),
      created_at: timestamp,
      updated_at: timestamp,
    };
  }
}

function findByUsername(state: LedgerState, username: string): User | undefined {
  const wanted = username.trim().toLowerCase();
  for (const user of state.users.values()) {
    if (user.username.toLowerCase() === wanted) {
      return user;
    }
  }
  return undefined;
}

function activeAdministrators(state: LedgerState): number {
  let count = 0;
  for (const user of state.users.values()) {
    if (user.role === 'ADMINISTRATOR' && user.is_active) {
      count += 1;
    }
  }
  return count;
}

function validateContact(input: {
  phone?: string | null;
  email?: string | null;
}): ValidationError | null {
  const email = optionalText(input.email);
  if (email && !isValidEmail(email)) {
    return ValidationErrors.INVALID_FORMAT('email', 'name@example.org');
  }

  const phone = optionalText(input.phone);
  if (phone && !isValidPhone(phone)) {
    return ValidationErrors.INVALID_FORMAT('phone', 'digits, optionally starting with +');
  }

  return null;
}

function userCreatedEntry(
  actorId: string,
  user: User,
  details: Record<string, unknown>
): AuditDraft {
  return {
    actor_id: actorId,
    operation: 'user.create',
    entity_type: 'user',
    entity_id: user.id,
    before_status: null,
    after_status: user.role,
    details: { username: user.username, ...details },
  };
}
