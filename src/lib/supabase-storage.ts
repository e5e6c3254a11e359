/**
 * Supabase-backed storage engine
 *
 * Ledger values live in the `ledger_kv` table (see
 * supabase/migrations/0001_ledger_kv.sql); snapshot blobs go to a storage
 * bucket. Each call is a single PostgREST or storage request, so a write is
 * either fully visible or not at all.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import * as crypto from 'crypto';
import type { StorageEngine } from './storage';
import { StorageErrors } from '../types/errors';

const TABLE = 'ledger_kv';
const PAGE_SIZE = 1000;

/**
 * Create a Supabase client with service role (server-side only)
 */
export function createServiceClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

export class SupabaseStorageEngine implements StorageEngine {
  constructor(
    private supabase: SupabaseClient,
    private snapshotBucket: string
  ) {}

  async atomicRead(key: string): Promise<unknown> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select('value')
      .eq('key', key)
      .maybeSingle();

    if (error) {
      throw StorageErrors.UNAVAILABLE(`read ${key}`, error);
    }

    return data ? data.value : null;
  }

  async atomicWrite(key: string, value: unknown): Promise<void> {
    const { error } = await this.supabase.from(TABLE).upsert({
      key,
      value,
      updated_at: new Date().toISOString(),
    });

    if (error) {
      throw StorageErrors.UNAVAILABLE(`write ${key}`, error);
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    const pattern = prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`) + '%';

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.supabase
        .from(TABLE)
        .select('key')
        .like('key', pattern)
        .order('key', { ascending: true })
        .range(offset, offset + PAGE_SIZE - 1);

      if (error) {
        throw StorageErrors.UNAVAILABLE(`list ${prefix}`, error);
      }

      const rows = data ?? [];
      for (const row of rows) {
        if (typeof row.key === 'string') {
          keys.push(row.key);
        }
      }

      if (rows.length < PAGE_SIZE) {
        return keys;
      }
    }
  }

  async durableSnapshotWrite(blob: string): Promise<string> {
    const path = `${new Date().toISOString().replace(/[:.]/g, '-')}-${crypto.randomUUID()}.json`;

    const { error } = await this.supabase.storage
      .from(this.snapshotBucket)
      .upload(path, blob, { contentType: 'application/json', upsert: false });

    if (error) {
      throw StorageErrors.UNAVAILABLE(`snapshot upload ${path}`, error);
    }

    return path;
  }

  async readSnapshot(snapshotId: string): Promise<string> {
    const { data, error } = await this.supabase.storage
      .from(this.snapshotBucket)
      .download(snapshotId);

    if (error || !data) {
      throw StorageErrors.UNAVAILABLE(`snapshot download ${snapshotId}`, error);
    }

    return data.text();
  }
}
