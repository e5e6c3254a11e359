/**
 * Storage engine boundary
 *
 * The ledger needs all-or-nothing reads and writes of whole values plus a
 * durable place for snapshot blobs. Partial writes are never visible.
 */

export interface StorageEngine {
  /** Value stored under key, or null when absent */
  atomicRead(key: string): Promise<unknown>;

  atomicWrite(key: string, value: unknown): Promise<void>;

  /** Keys starting with prefix, sorted ascending */
  listKeys(prefix: string): Promise<string[]>;

  /** Durably store a snapshot blob, returning its identifier */
  durableSnapshotWrite(blob: string): Promise<string>;

  readSnapshot(snapshotId: string): Promise<string>;
}

/**
 * In-process engine. Values are kept serialized so callers never share
 * object references with the store.
 */
export class MemoryStorageEngine implements StorageEngine {
  private values = new Map<string, string>();
  private snapshots = new Map<string, string>();
  private snapshotCounter = 0;

  async atomicRead(key: string): Promise<unknown> {
    const raw = this.values.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async atomicWrite(key: string, value: unknown): Promise<void> {
    this.values.set(key, JSON.stringify(value));
  }

  async listKeys(prefix: string): Promise<string[]> {
    return [...this.values.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async durableSnapshotWrite(blob: string): Promise<string> {
    this.snapshotCounter += 1;
    const id = `snapshot-${String(this.snapshotCounter).padStart(6, '0')}`;
    this.snapshots.set(id, blob);
    return id;
  }

  async readSnapshot(snapshotId: string): Promise<string> {
    const blob = this.snapshots.get(snapshotId);
    if (blob === undefined) {
      throw new Error(`Snapshot ${snapshotId} not found`);
    }
    return blob;
  }
}
