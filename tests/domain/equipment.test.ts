/**
 * Equipment Registry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { ServiceContext } from '../../src/types/context';
import { StateDraft } from '../../src/domain/ledger.state';
import { applyEquipmentTransition } from '../../src/domain/equipment.service';
import {
  TestLedger,
  addEquipment,
  addUser,
  createTestLedger,
  failure,
  unwrap,
} from '../helpers';

describe('EquipmentService', () => {
  let t: TestLedger;
  let technician: ServiceContext;
  let supervisor: ServiceContext;

  beforeEach(async () => {
    t = await createTestLedger();
    technician = await addUser(t, 'tech1', 'TECHNICIAN');
    supervisor = await addUser(t, 'sup1', 'SUPERVISOR');
  });

  describe('register', () => {
    it('should register equipment as AVAILABLE', async () => {
      const result = await t.ledger.equipment.register(t.admin, {
        qrCode: 'EQ-0001',
        name: '  Laptop ',
        location: 'Lab 2',
        category: 'Computers',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.status).toBe('AVAILABLE');
        expect(result.data.name).toBe('Laptop');
        expect(result.data.category).toBe('Computers');
        expect(result.data.notes).toBeNull();
        expect(result.data.created_at).toBe('2025-03-03T09:00:00.000Z');
      }
    });

    it('should reject a duplicate code', async () => {
      await addEquipment(t, 'EQ-0001');
      const error = failure(
        await t.ledger.equipment.register(t.admin, { qrCode: 'EQ-0001', name: 'Other', location: 'Lab' })
      );

      expect(error.kind).toBe('DuplicateCode');
      expect(error.code).toBe('EQUIPMENT_DUPLICATE_CODE');
    });

    it('should reject a malformed code', async () => {
      const error = failure(
        await t.ledger.equipment.register(t.admin, { qrCode: 'eq-1', name: 'Laptop', location: 'Lab' })
      );

      expect(error.kind).toBe('ValidationFailed');
      expect(error.code).toBe('EQUIPMENT_INVALID_CODE');
    });

    it('should require a location', async () => {
      const error = failure(
        await t.ledger.equipment.register(t.admin, { qrCode: 'EQ-0002', name: 'Laptop', location: '   ' })
      );

      expect(error.kind).toBe('ValidationFailed');
      expect(error.context).toEqual({ field: 'location' });
    });

    it('should only allow administrators to register', async () => {
      const error = failure(
        await t.ledger.equipment.register(technician, { qrCode: 'EQ-0003', name: 'Drill', location: 'Lab' })
      );

      expect(error.kind).toBe('Unauthorized');
      expect(t.ledger.equipment.search()).toHaveLength(0);
    });

    it('should audit the registration', async () => {
      const item = await addEquipment(t, 'EQ-0004');
      const entries = [...t.ledger.audit.query({ entityId: item.id })];

      expect(entries).toHaveLength(1);
      expect(entries[0].operation).toBe('equipment.register');
      expect(entries[0].actor_id).toBe(t.admin.userId);
      expect(entries[0].after_status).toBe('AVAILABLE');
    });
  });

  describe('transition', () => {
    it('should move AVAILABLE equipment to MAINTENANCE and back', async () => {
      const item = await addEquipment(t, 'EQ-0001');

      const down = unwrap(await t.ledger.equipment.transition(technician, item.id, 'MAINTENANCE', { reason: 'cracked screen' }));
      expect(down.status).toBe('MAINTENANCE');

      const up = unwrap(await t.ledger.equipment.transition(technician, item.id, 'AVAILABLE'));
      expect(up.status).toBe('AVAILABLE');

      const transitions = [...t.ledger.audit.query({ entityId: item.id, operation: 'equipment.transition' })];
      expect(transitions.map((entry) => [entry.before_status, entry.after_status])).toEqual([
        ['AVAILABLE', 'MAINTENANCE'],
        ['MAINTENANCE', 'AVAILABLE'],
      ]);
      expect(transitions[0].details).toEqual({ origin: 'manual', reason: 'cracked screen' });
    });

    it('should keep RETIRED terminal', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      unwrap(await t.ledger.equipment.transition(t.admin, item.id, 'RETIRED'));

      const error = failure(await t.ledger.equipment.transition(t.admin, item.id, 'AVAILABLE'));
      expect(error.kind).toBe('InvalidTransition');
      expect(error.code).toBe('EQUIPMENT_RETIRED');
    });

    it('should reject a same-status transition', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const error = failure(await t.ledger.equipment.transition(t.admin, item.id, 'AVAILABLE'));

      expect(error.code).toBe('EQUIPMENT_INVALID_TRANSITION');
    });

    it('should reject MAINTENANCE to LOANED', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      unwrap(await t.ledger.equipment.transition(technician, item.id, 'MAINTENANCE'));

      const error = failure(await t.ledger.equipment.transition(t.admin, item.id, 'LOANED'));
      expect(error.kind).toBe('InvalidTransition');
      expect(error.code).toBe('EQUIPMENT_INVALID_TRANSITION');
    });

    it('should leave loan-driven edges to the loan ledger', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const error = failure(await t.ledger.equipment.transition(t.admin, item.id, 'LOANED'));

      expect(error.code).toBe('EQUIPMENT_LOAN_DRIVEN_TRANSITION');
      expect(unwrap(t.ledger.equipment.lookup(item.id)).status).toBe('AVAILABLE');
    });

    it('should not retire equipment that is out on loan', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      unwrap(await t.ledger.loans.issue(t.admin, { equipmentId: item.id, supervisorId: supervisor.userId }));

      const error = failure(await t.ledger.equipment.transition(t.admin, item.id, 'RETIRED'));
      expect(error.code).toBe('EQUIPMENT_LOAN_DRIVEN_TRANSITION');
    });

    it('should report unknown equipment as NotFound', async () => {
      const error = failure(await t.ledger.equipment.transition(t.admin, 'missing-id', 'MAINTENANCE'));
      expect(error.kind).toBe('NotFound');
    });

    it('should only let administrators retire', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const error = failure(await t.ledger.equipment.transition(technician, item.id, 'RETIRED'));

      expect(error.kind).toBe('Unauthorized');
    });

    it('should not let supervisors change maintenance status', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const error = failure(await t.ledger.equipment.transition(supervisor, item.id, 'MAINTENANCE'));

      expect(error.kind).toBe('Unauthorized');
    });
  });

  describe('applyEquipmentTransition', () => {
    it('should leave the draft untouched when rejecting', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const draft = new StateDraft(t.ledger.store.current());

      const result = applyEquipmentTransition(draft, {
        equipmentId: item.id,
        target: 'AVAILABLE',
        origin: 'loan',
        actorId: t.admin.userId,
        now: new Date('2025-03-04T00:00:00.000Z'),
      });

      expect(result.success).toBe(false);
      expect(draft.getEquipment(item.id)).toBe(item);
    });

    it('should record a new location with a loan-driven move', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const draft = new StateDraft(t.ledger.store.current());

      const result = unwrap(
        applyEquipmentTransition(draft, {
          equipmentId: item.id,
          target: 'LOANED',
          origin: 'loan',
          actorId: t.admin.userId,
          now: new Date('2025-03-04T00:00:00.000Z'),
          location: 'Site B',
        })
      );

      expect(result.equipment.location).toBe('Site B');
      expect(result.audit.details).toEqual({ origin: 'loan', location: 'Site B' });
      expect(draft.getEquipment(item.id)?.status).toBe('LOANED');
    });
  });

  describe('updateDetails', () => {
    it('should update descriptive fields', async () => {
      const item = await addEquipment(t, 'EQ-0001', { category: 'Tools' });
      const updated = unwrap(
        await t.ledger.equipment.updateDetails(technician, item.id, { name: 'Cordless Drill', category: null })
      );

      expect(updated.name).toBe('Cordless Drill');
      expect(updated.category).toBeNull();
      expect(updated.qr_code).toBe('EQ-0001');

      const [entry] = [...t.ledger.audit.query({ entityId: item.id, operation: 'equipment.update' })];
      expect(entry.details).toEqual({
        changes: {
          name: { from: 'Item EQ-0001', to: 'Cordless Drill' },
          category: { from: 'Tools', to: null },
        },
      });
    });

    it('should copy a location change onto the open loan', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      const loan = unwrap(
        await t.ledger.loans.issue(t.admin, {
          equipmentId: item.id,
          supervisorId: supervisor.userId,
          location: 'Site A',
        })
      );

      unwrap(await t.ledger.equipment.updateDetails(t.admin, item.id, { location: 'Site C' }));

      expect(unwrap(t.ledger.loans.getLoan(loan.id)).location).toBe('Site C');
      const relocations = [...t.ledger.audit.query({ entityId: loan.id, operation: 'loan.relocate' })];
      expect(relocations).toHaveLength(1);
      expect(relocations[0].details).toEqual({ from: 'Site A', to: 'Site C' });
    });

    it('should refuse to edit retired equipment', async () => {
      const item = await addEquipment(t, 'EQ-0001');
      unwrap(await t.ledger.equipment.transition(t.admin, item.id, 'RETIRED'));

      const error = failure(await t.ledger.equipment.updateDetails(t.admin, item.id, { name: 'Scrap' }));
      expect(error.code).toBe('EQUIPMENT_RETIRED');
    });
  });

  describe('queries', () => {
    it('should find equipment by code', async () => {
      const item = await addEquipment(t, 'EQ-0001');

      expect(unwrap(t.ledger.equipment.byCode('EQ-0001')).id).toBe(item.id);
      expect(failure(t.ledger.equipment.byCode('EQ-9999')).code).toBe('EQUIPMENT_CODE_NOT_FOUND');
    });

    it('should search by text, status and category ordered by code', async () => {
      await addEquipment(t, 'EQ-0003', { name: 'Projector', location: 'Hall' });
      await addEquipment(t, 'EQ-0001', { name: 'Laptop', location: 'Lab 1', category: 'Computers' });
      const tablet = await addEquipment(t, 'EQ-0002', { name: 'Tablet', location: 'Lab 2', category: 'computers' });
      unwrap(await t.ledger.equipment.transition(technician, tablet.id, 'MAINTENANCE'));

      expect(t.ledger.equipment.search({ text: 'lab' }).map((item) => item.qr_code)).toEqual([
        'EQ-0001',
        'EQ-0002',
      ]);
      expect(t.ledger.equipment.search({ status: 'AVAILABLE' }).map((item) => item.qr_code)).toEqual([
        'EQ-0001',
        'EQ-0003',
      ]);
      expect(t.ledger.equipment.search({ category: 'COMPUTERS' }).map((item) => item.qr_code)).toEqual([
        'EQ-0001',
        'EQ-0002',
      ]);
    });
  });
});
