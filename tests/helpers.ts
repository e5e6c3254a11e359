/**
 * Shared fixtures for ledger tests
 */

import type { Result, ServiceContext } from '../src/types/context';
import type { Equipment, UserRole } from '../src/types/records';
import { createConfig, LedgerConfigInput } from '../src/lib/config';
import type { CredentialHasher } from '../src/lib/credentials';
import { MemoryStorageEngine } from '../src/lib/storage';
import { Ledger, openLedger } from '../src/ledger';

export const TEST_PASSWORD = 'test-secret';
export const START = '2025-03-03T09:00:00.000Z';
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Manually advanced clock
 */
export class TestClock {
  private current: number;

  constructor(start: string = START) {
    this.current = Date.parse(start);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }
}

/**
 * Reversible stand-in for scrypt so identity tests stay fast
 */
export class PlainHasher implements CredentialHasher {
  async hash(secret: string): Promise<string> {
    return `plain:${secret}`;
  }

  async verify(secret: string, material: string): Promise<boolean> {
    return material === `plain:${secret}`;
  }
}

/**
 * Memory engine whose writes and snapshot calls can be made to fail
 */
export class FlakyStorageEngine extends MemoryStorageEngine {
  failWrite: ((key: string) => boolean) | null = null;
  failSnapshots = false;
  /** Snapshot writes never settle while set */
  hangSnapshots = false;
  writes: string[] = [];

  async atomicWrite(key: string, value: unknown): Promise<void> {
    if (this.failWrite && this.failWrite(key)) {
      throw new Error(`disk full writing ${key}`);
    }
    this.writes.push(key);
    return super.atomicWrite(key, value);
  }

  async durableSnapshotWrite(blob: string): Promise<string> {
    if (this.failSnapshots) {
      throw new Error('backup volume offline');
    }
    if (this.hangSnapshots) {
      return new Promise<string>(() => undefined);
    }
    return super.durableSnapshotWrite(blob);
  }
}

export interface TestLedger {
  ledger: Ledger;
  clock: TestClock;
  storage: FlakyStorageEngine;
  admin: ServiceContext;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.data;
}

export function failure<T, E>(result: Result<T, E>): E {
  if (result.success) {
    throw new Error('Expected failure, got success');
  }
  return result.error;
}

export async function createTestLedger(
  overrides: Partial<LedgerConfigInput> = {},
  options: { storage?: FlakyStorageEngine; clock?: TestClock } = {}
): Promise<TestLedger> {
  const storage = options.storage ?? new FlakyStorageEngine();
  const clock = options.clock ?? new TestClock();
  const config = createConfig({
    loanPeriodDays: 7,
    defaultLoanLimit: 2,
    logLevel: 'silent',
    ...overrides,
  });

  const ledger = unwrap(
    await openLedger({ config, storage, hasher: new PlainHasher(), clock: clock.now })
  );

  const users = [...ledger.store.current().users.values()];
  const existingAdmin = users.find((user) => user.role === 'ADMINISTRATOR');
  if (existingAdmin) {
    return { ledger, clock, storage, admin: { userId: existingAdmin.id, userRole: 'ADMINISTRATOR' } };
  }

  const admin = unwrap(
    await ledger.identity.bootstrapAdministrator(
      { systemId: 'bootstrap', reason: 'test setup' },
      { username: 'admin', fullName: 'Ada Admin', password: TEST_PASSWORD }
    )
  );
  return { ledger, clock, storage, admin: { userId: admin.id, userRole: 'ADMINISTRATOR' } };
}

export async function addUser(
  t: TestLedger,
  username: string,
  role: UserRole,
  extra: { maxConcurrentLoans?: number; department?: string; fullName?: string } = {}
): Promise<ServiceContext> {
  const user = unwrap(
    await t.ledger.identity.createUser(t.admin, {
      username,
      fullName: extra.fullName ?? `User ${username}`,
      password: TEST_PASSWORD,
      role,
      maxConcurrentLoans: extra.maxConcurrentLoans,
      department: extra.department,
    })
  );
  return { userId: user.id, userRole: user.role };
}

export async function addEquipment(
  t: TestLedger,
  qrCode: string,
  extra: { name?: string; location?: string; category?: string } = {}
): Promise<Equipment> {
  return unwrap(
    await t.ledger.equipment.register(t.admin, {
      qrCode,
      name: extra.name ?? `Item ${qrCode}`,
      location: extra.location ?? 'Store Room',
      category: extra.category,
    })
  );
}
