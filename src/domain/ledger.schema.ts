/**
 * Schemas for everything the ledger reads back from storage: the committed
 * state document, audit batches and snapshot bundles.
 */

import { z } from 'zod';
import type { AuditEntry, Equipment, Loan, User } from '../types/records';

export const SNAPSHOT_FORMAT = 'equipment-ledger-snapshot';
export const SNAPSHOT_SCHEMA_VERSION = 1;

// Timestamps are compared as strings, so only the toISOString() shape is accepted
const timestamp = z.string().datetime({ precision: 3 });

export const equipmentSchema: z.ZodType<Equipment> = z.object({
  id: z.string().min(1),
  qr_code: z.string().min(1),
  name: z.string(),
  category: z.string().nullable(),
  location: z.string(),
  notes: z.string().nullable(),
  status: z.enum(['AVAILABLE', 'LOANED', 'MAINTENANCE', 'RETIRED']),
  created_at: timestamp,
  updated_at: timestamp,
});

export const userSchema: z.ZodType<User> = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  full_name: z.string(),
  role: z.enum(['ADMINISTRATOR', 'SUPERVISOR', 'TECHNICIAN']),
  password_hash: z.string().min(1),
  is_active: z.boolean(),
  failed_attempts: z.number().int().min(0),
  locked_until: timestamp.nullable(),
  last_login_at: timestamp.nullable(),
  max_concurrent_loans: z.number().int().positive().nullable(),
  phone: z.string().nullable(),
  email: z.string().nullable(),
  department: z.string().nullable(),
  created_at: timestamp,
  updated_at: timestamp,
});

export const loanSchema: z.ZodType<Loan> = z.object({
  id: z.string().min(1),
  equipment_id: z.string().min(1),
  supervisor_id: z.string().min(1),
  issued_by: z.string().min(1),
  issued_at: timestamp,
  due_at: timestamp,
  returned_at: timestamp.nullable(),
  returned_by: z.string().nullable(),
  status: z.enum(['OPEN', 'RETURNED']),
  location: z.string().nullable(),
  notes: z.string().nullable(),
});

export const auditEntrySchema: z.ZodType<AuditEntry> = z.object({
  sequence: z.number().int().positive(),
  timestamp,
  actor_id: z.string().min(1),
  operation: z.enum([
    'equipment.register',
    'equipment.transition',
    'equipment.update',
    'loan.issue',
    'loan.return',
    'loan.relocate',
    'user.create',
    'user.role_change',
    'user.deactivate',
    'user.limit_change',
    'user.profile_update',
    'user.login',
    'user.login_failed',
    'snapshot.restore',
  ]),
  entity_type: z.enum(['equipment', 'loan', 'user', 'ledger']),
  entity_id: z.string().min(1),
  before_status: z.string().nullable(),
  after_status: z.string().nullable(),
  details: z.record(z.unknown()),
});

export const auditBatchSchema = z.array(auditEntrySchema);

export const persistedLedgerSchema = z.object({
  generation: z.number().int().min(0),
  revision: z.number().int().min(0),
  /** Audit entries past this sequence belong to an uncommitted write */
  audit_sequence: z.number().int().min(0),
  equipment: z.array(equipmentSchema),
  loans: z.array(loanSchema),
  users: z.array(userSchema),
});

export type PersistedLedger = z.infer<typeof persistedLedgerSchema>;

/** Just enough of a bundle to decide whether the rest is worth parsing */
export const snapshotHeaderSchema = z.object({
  format: z.string(),
  schema_version: z.number(),
});

export const snapshotBundleSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
  created_at: timestamp,
  revision: z.number().int().min(0),
  equipment: z.array(equipmentSchema),
  loans: z.array(loanSchema),
  users: z.array(userSchema),
  audit: z.array(auditEntrySchema),
});

export type SnapshotBundle = z.infer<typeof snapshotBundleSchema>;
