/**
 * Snapshot / Backup Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { ServiceContext } from '../../src/types/context';
import type { Equipment } from '../../src/types/records';
import { snapshotBundleSchema } from '../../src/domain/ledger.schema';
import {
  TestLedger,
  addEquipment,
  addUser,
  createTestLedger,
  failure,
  unwrap,
} from '../helpers';

describe('SnapshotService', () => {
  let t: TestLedger;
  let sup: ServiceContext;
  let item: Equipment;

  beforeEach(async () => {
    t = await createTestLedger({ snapshotTimeoutMs: 50 });
    sup = await addUser(t, 'sup1', 'SUPERVISOR');
    item = await addEquipment(t, 'EQ-0001');
  });

  describe('snapshot', () => {
    it('should capture every collection and the audit trail', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));

      expect(handle.id).toBe('snapshot-000001');
      expect(handle.schema_version).toBe(1);
      expect(handle.equipment_count).toBe(1);
      expect(handle.loan_count).toBe(0);
      expect(handle.audit_count).toBe(t.ledger.audit.size);
      expect(handle.revision).toBe(t.ledger.store.current().revision);

      const bundle = snapshotBundleSchema.parse(JSON.parse(await t.storage.readSnapshot(handle.id)));
      expect(bundle.users.map((user) => user.username).sort()).toEqual(['admin', 'sup1']);
    });

    it('should not change the ledger or its audit trail', async () => {
      const before = t.ledger.store.current();
      const auditSize = t.ledger.audit.size;

      unwrap(await t.ledger.snapshots.snapshot(t.admin));

      expect(t.ledger.store.current()).toBe(before);
      expect(t.ledger.audit.size).toBe(auditSize);
    });

    it('should report a failed write as SnapshotFailed', async () => {
      t.storage.failSnapshots = true;
      const error = failure(await t.ledger.snapshots.snapshot(t.admin));

      expect(error.kind).toBe('SnapshotFailed');
      expect(error.code).toBe('SNAPSHOT_WRITE_FAILED');
    });

    it('should give up on a write that outlives the timeout', async () => {
      t.storage.hangSnapshots = true;
      const error = failure(await t.ledger.snapshots.snapshot(t.admin));

      expect(error.code).toBe('SNAPSHOT_TIMEOUT');
      expect(error.context).toEqual({ timeout_ms: 50 });
    });

    it('should allow the scheduler but not technicians', async () => {
      const tech = await addUser(t, 'tech1', 'TECHNICIAN');

      expect(failure(await t.ledger.snapshots.snapshot(tech)).kind).toBe('Unauthorized');
      expect(
        (await t.ledger.snapshots.snapshot({ systemId: 'scheduler', reason: 'nightly' })).success
      ).toBe(true);
    });
  });

  describe('restore', () => {
    it('should bring back the snapshotted state', async () => {
      const loan = unwrap(await t.ledger.loans.issue(t.admin, { equipmentId: item.id, supervisorId: sup.userId }));
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      const revisionAtSnapshot = t.ledger.store.current().revision;

      unwrap(await t.ledger.loans.returnLoan(t.admin, loan.id));
      await addEquipment(t, 'EQ-0002');

      const restored = unwrap(await t.ledger.snapshots.restore(t.admin, handle));

      expect(restored.id).toBe(handle.id);
      expect(t.ledger.equipment.search().map((equipment) => equipment.qr_code)).toEqual(['EQ-0001']);
      expect(unwrap(t.ledger.equipment.lookup(item.id)).status).toBe('LOANED');
      expect(unwrap(t.ledger.loans.getLoan(loan.id)).status).toBe('OPEN');
      expect(t.ledger.store.current().revision).toBeGreaterThan(revisionAtSnapshot);
    });

    it('should append the restore after the restored audit entries', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      await addEquipment(t, 'EQ-0002');

      unwrap(await t.ledger.snapshots.restore(t.admin, handle.id));

      const entries = [...t.ledger.audit.query()];
      expect(entries).toHaveLength(handle.audit_count + 1);
      const last = entries[entries.length - 1];
      expect(last.operation).toBe('snapshot.restore');
      expect(last.sequence).toBe(handle.audit_count + 1);
      expect(last.entity_id).toBe(handle.id);
    });

    it('should survive a reload after restore', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      await addEquipment(t, 'EQ-0002');
      unwrap(await t.ledger.snapshots.restore(t.admin, handle));

      const reopened = await createTestLedger({}, { storage: t.storage, clock: t.clock });

      expect(reopened.ledger.store.current().generation).toBe(1);
      expect(reopened.ledger.equipment.search()).toHaveLength(1);
      expect(reopened.ledger.audit.size).toBe(handle.audit_count + 1);
    });

    it('should reject a bundle of another format', async () => {
      const id = await t.storage.durableSnapshotWrite(JSON.stringify({ format: 'spreadsheet', schema_version: 1 }));
      const before = t.ledger.store.current();

      const error = failure(await t.ledger.snapshots.restore(t.admin, id));

      expect(error.kind).toBe('IncompatibleSnapshot');
      expect(t.ledger.store.current()).toBe(before);
    });

    it('should reject a newer schema version', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      const bundle = JSON.parse(await t.storage.readSnapshot(handle.id));
      const id = await t.storage.durableSnapshotWrite(JSON.stringify({ ...bundle, schema_version: 2 }));

      const error = failure(await t.ledger.snapshots.restore(t.admin, id));
      expect(error.context).toEqual({ snapshot_id: id, detail: 'schema version 2, expected 1' });
    });

    it('should reject a blob that is not JSON', async () => {
      const id = await t.storage.durableSnapshotWrite('not json at all');
      expect(failure(await t.ledger.snapshots.restore(t.admin, id)).kind).toBe('IncompatibleSnapshot');
    });

    it('should reject loaned equipment without an open loan', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      const bundle = snapshotBundleSchema.parse(JSON.parse(await t.storage.readSnapshot(handle.id)));
      const tampered = {
        ...bundle,
        equipment: bundle.equipment.map((equipment) => ({ ...equipment, status: 'LOANED' })),
      };
      const id = await t.storage.durableSnapshotWrite(JSON.stringify(tampered));

      const error = failure(await t.ledger.snapshots.restore(t.admin, id));
      expect(error.context).toEqual({
        snapshot_id: id,
        detail: `equipment ${item.id} is LOANED with 0 open loans`,
      });
    });

    it('should reject timestamps without milliseconds', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      const bundle = snapshotBundleSchema.parse(JSON.parse(await t.storage.readSnapshot(handle.id)));
      const tampered = {
        ...bundle,
        equipment: bundle.equipment.map((equipment) => ({ ...equipment, created_at: '2025-03-03T09:00:00Z' })),
      };
      const id = await t.storage.durableSnapshotWrite(JSON.stringify(tampered));
      const before = t.ledger.store.current();

      const error = failure(await t.ledger.snapshots.restore(t.admin, id));

      expect(error.code).toBe('SNAPSHOT_INCOMPATIBLE');
      expect(t.ledger.store.current()).toBe(before);
    });

    it('should report a missing snapshot as SnapshotFailed', async () => {
      expect(failure(await t.ledger.snapshots.restore(t.admin, 'snapshot-999999')).code).toBe('SNAPSHOT_READ_FAILED');
    });

    it('should only let administrators restore', async () => {
      const handle = unwrap(await t.ledger.snapshots.snapshot(t.admin));
      expect(failure(await t.ledger.snapshots.restore(sup, handle)).kind).toBe('Unauthorized');
    });
  });

  describe('startAutoBackup', () => {
    it('should need an interval', () => {
      expect(failure(t.ledger.snapshots.startAutoBackup()).kind).toBe('ValidationFailed');
    });

    it('should write snapshots until stopped', async () => {
      const stop = unwrap(t.ledger.snapshots.startAutoBackup(10));
      await new Promise((resolve) => setTimeout(resolve, 60));
      stop();

      const blob = await t.storage.readSnapshot('snapshot-000001');
      expect(snapshotBundleSchema.parse(JSON.parse(blob)).equipment).toHaveLength(1);
    });
  });
});
