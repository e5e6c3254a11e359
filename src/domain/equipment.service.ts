/**
 * Equipment Registry Service
 *
 * Registers equipment under its QR code and enforces the status state
 * machine. Edges into or out of LOANED belong to the loan ledger, which
 * applies them through applyEquipmentTransition inside its own commit.
 */

import * as crypto from 'crypto';
import type { AuditDraft, Equipment, EquipmentStatus } from '../types/records';
import {
  AuthError,
  EquipmentError,
  EquipmentErrors,
  StorageError,
  ValidationError,
  ValidationErrors,
} from '../types/errors';
import { ServiceContext, Result, ok, err } from '../types/context';
import { isNonEmptyString, isValidEquipmentCode, optionalText } from '../lib/validation';
import { LedgerStore, commit } from './ledger.store';
import { StateDraft } from './ledger.state';
import { Capability, requireCapability } from './permissions';

// ============================================
// STATE MACHINE
// ============================================

export const EQUIPMENT_TRANSITIONS: Record<EquipmentStatus, EquipmentStatus[]> = {
  AVAILABLE: ['LOANED', 'MAINTENANCE', 'RETIRED'],
  LOANED: ['AVAILABLE', 'MAINTENANCE', 'RETIRED'],
  MAINTENANCE: ['AVAILABLE', 'RETIRED'],
  RETIRED: [],
};

export interface TransitionRequest {
  equipmentId: string;
  target: EquipmentStatus;
  /** Only the loan ledger may move equipment into or out of LOANED */
  origin: 'loan' | 'manual';
  actorId: string;
  now: Date;
  /** New location recorded with the move, if any */
  location?: string | null;
  details?: Record<string, unknown>;
}

export interface AppliedTransition {
  equipment: Equipment;
  audit: AuditDraft;
}

/**
 * Apply one status change to a draft. Nothing is written to the draft when
 * the change is rejected.
 */
export function applyEquipmentTransition(
  draft: StateDraft,
  request: TransitionRequest
): Result<AppliedTransition, EquipmentError> {
  const current = draft.getEquipment(request.equipmentId);
  if (!current) {
    return err(EquipmentErrors.NOT_FOUND(request.equipmentId));
  }

  const from = current.status;
  const to = request.target;

  if (from === 'RETIRED') {
    return err(EquipmentErrors.RETIRED(current.id));
  }

  if (from === to || !EQUIPMENT_TRANSITIONS[from].includes(to)) {
    return err(EquipmentErrors.INVALID_TRANSITION(from, to));
  }

  if (request.origin === 'manual' && (from === 'LOANED' || to === 'LOANED')) {
    return err(EquipmentErrors.RESERVED_TRANSITION(from, to));
  }

  const location = optionalText(request.location) ?? current.location;
  const updated: Equipment = {
    ...current,
    status: to,
    location,
    updated_at: request.now.toISOString(),
  };
  draft.putEquipment(updated);

  const details: Record<string, unknown> = { origin: request.origin, ...request.details };
  if (location !== current.location) {
    details.location = location;
  }

  return ok({
    equipment: updated,
    audit: {
      actor_id: request.actorId,
      operation: 'equipment.transition',
      entity_type: 'equipment',
      entity_id: current.id,
      before_status: from,
      after_status: to,
      details,
    },
  });
}

// ============================================
// TYPES
// ============================================

export interface RegisterEquipmentInput {
  qrCode: string;
  name: string;
  category?: string;
  location: string;
  notes?: string;
}

export interface UpdateEquipmentInput {
  name?: string;
  category?: string | null;
  location?: string;
  notes?: string | null;
}

export interface EquipmentSearch {
  /** Matches code, name or location, case-insensitive */
  text?: string;
  status?: EquipmentStatus;
  category?: string;
  location?: string;
}

type RegistryFailure = EquipmentError | AuthError | ValidationError | StorageError;

// ============================================
// EQUIPMENT SERVICE
// ============================================

export class EquipmentService {
  constructor(private store: LedgerStore) {}

  /**
   * Register new equipment in AVAILABLE status
   */
  async register(
    ctx: ServiceContext,
    input: RegisterEquipmentInput
  ): Promise<Result<Equipment, RegistryFailure>> {
    const qrCode = input.qrCode.trim();
    if (!isValidEquipmentCode(qrCode)) {
      return err(EquipmentErrors.INVALID_CODE(qrCode));
    }
    if (!isNonEmptyString(input.name)) {
      return err(ValidationErrors.REQUIRED_FIELD('name'));
    }
    if (!isNonEmptyString(input.location)) {
      return err(ValidationErrors.REQUIRED_FIELD('location'));
    }

    return this.store.mutate<Equipment, EquipmentError | AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'equipment.register');
      if (!allowed.success) {
        return allowed;
      }

      if (state.codeIndex.has(qrCode)) {
        return err(EquipmentErrors.DUPLICATE_CODE(qrCode));
      }

      const timestamp = now.toISOString();
      const equipment: Equipment = {
        id: crypto.randomUUID(),
        qr_code: qrCode,
        name: input.name.trim(),
        category: optionalText(input.category),
        location: input.location.trim(),
        notes: optionalText(input.notes),
        status: 'AVAILABLE',
        created_at: timestamp,
        updated_at: timestamp,
      };

      const draft = new StateDraft(state);
      draft.putEquipment(equipment);
      return commit(
        draft.finish(),
        [
          {
            actor_id: ctx.userId,
            operation: 'equipment.register',
            entity_type: 'equipment',
            entity_id: equipment.id,
            before_status: null,
            after_status: 'AVAILABLE',
            details: { qr_code: qrCode, name: equipment.name, location: equipment.location },
          },
        ],
        equipment
      );
    });
  }

  /**
   * Manual status change (maintenance, repair, retirement)
   */
  async transition(
    ctx: ServiceContext,
    equipmentId: string,
    target: EquipmentStatus,
    options: { reason?: string } = {}
  ): Promise<Result<Equipment, RegistryFailure>> {
    const capability: Capability = target === 'RETIRED' ? 'equipment.retire' : 'equipment.maintain';
    const reason = optionalText(options.reason);

    return this.store.mutate<Equipment, EquipmentError | AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, capability);
      if (!allowed.success) {
        return allowed;
      }

      const draft = new StateDraft(state);
      const applied = applyEquipmentTransition(draft, {
        equipmentId,
        target,
        origin: 'manual',
        actorId: ctx.userId,
        now,
        details: reason ? { reason } : {},
      });
      if (!applied.success) {
        return applied;
      }

      return commit(draft.finish(), [applied.data.audit], applied.data.equipment);
    });
  }

  /**
   * Edit descriptive fields. The QR code and status are not editable here.
   */
  async updateDetails(
    ctx: ServiceContext,
    equipmentId: string,
    input: UpdateEquipmentInput
  ): Promise<Result<Equipment, RegistryFailure>> {
    if (input.name !== undefined && !isNonEmptyString(input.name)) {
      return err(ValidationErrors.REQUIRED_FIELD('name'));
    }
    if (input.location !== undefined && !isNonEmptyString(input.location)) {
      return err(ValidationErrors.REQUIRED_FIELD('location'));
    }

    return this.store.mutate<Equipment, EquipmentError | AuthError>((state, now) => {
      const allowed = requireCapability(state, ctx, 'equipment.update');
      if (!allowed.success) {
        return allowed;
      }

      const current = state.equipment.get(equipmentId);
      if (!current) {
        return err(EquipmentErrors.NOT_FOUND(equipmentId));
      }
      if (current.status === 'RETIRED') {
        return err(EquipmentErrors.RETIRED(equipmentId));
      }

      const timestamp = now.toISOString();
      const updated: Equipment = {
        ...current,
        name: input.name !== undefined ? input.name.trim() : current.name,
        category: input.category !== undefined ? optionalText(input.category) : current.category,
        location: input.location !== undefined ? input.location.trim() : current.location,
        notes: input.notes !== undefined ? optionalText(input.notes) : current.notes,
        updated_at: timestamp,
      };

      const draft = new StateDraft(state);
      draft.putEquipment(updated);

      const audit: AuditDraft[] = [
        {
          actor_id: ctx.userId,
          operation: 'equipment.update',
          entity_type: 'equipment',
          entity_id: equipmentId,
          before_status: current.status,
          after_status: current.status,
          details: { changes: changedFields(current, updated) },
        },
      ];

      // Keep the open loan's destination in step with where the item is
      if (updated.location !== current.location) {
        const openLoan = draft.loansOfEquipment(equipmentId).find((loan) => loan.status === 'OPEN');
        if (openLoan) {
          draft.putLoan({ ...openLoan, location: updated.location });
          audit.push({
            actor_id: ctx.userId,
            operation: 'loan.relocate',
            entity_type: 'loan',
            entity_id: openLoan.id,
            before_status: 'OPEN',
            after_status: 'OPEN',
            details: { from: openLoan.location, to: updated.location },
          });
        }
      }

      return commit(draft.finish(), audit, updated);
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  lookup(equipmentId: string): Result<Equipment, EquipmentError> {
    const equipment = this.store.current().equipment.get(equipmentId);
    if (!equipment) {
      return err(EquipmentErrors.NOT_FOUND(equipmentId));
    }
    return ok(equipment);
  }

  byCode(qrCode: string): Result<Equipment, EquipmentError> {
    const state = this.store.current();
    const id = state.codeIndex.get(qrCode.trim());
    const equipment = id === undefined ? undefined : state.equipment.get(id);
    if (!equipment) {
      return err(EquipmentErrors.CODE_NOT_FOUND(qrCode));
    }
    return ok(equipment);
  }

  /**
   * Filtered equipment list ordered by code
   */
  search(filters: EquipmentSearch = {}): Equipment[] {
    const text = filters.text?.trim().toLowerCase();
    const category = filters.category?.trim().toLowerCase();
    const location = filters.location?.trim().toLowerCase();

    return [...this.store.current().equipment.values()]
      .filter((item) => !filters.status || item.status === filters.status)
      .filter((item) => !category || (item.category ?? '').toLowerCase() === category)
      .filter((item) => !location || item.location.toLowerCase().includes(location))
      .filter(
        (item) =>
          !text ||
          item.qr_code.toLowerCase().includes(text) ||
          item.name.toLowerCase().includes(text) ||
          item.location.toLowerCase().includes(text)
      )
      .sort((a, b) => (a.qr_code < b.qr_code ? -1 : a.qr_code > b.qr_code ? 1 : 0));
  }
}

function changedFields(before: Equipment, after: Equipment): Record<string, unknown> {
  const changes: Record<string, unknown> = {};
  const fields = ['name', 'category', 'location', 'notes'] as const;
  for (const field of fields) {
    if (before[field] !== after[field]) {
      changes[field] = { from: before[field], to: after[field] };
    }
  }
  return changes;
}
