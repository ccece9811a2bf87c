import type { Knex } from 'knex';
import { assertSafeKey, assertSafeNamespace, locator, type KeyValueStore } from './key-value-store.js';

export const KV_RECORDS_TABLE = 'kv_records';
export const KV_LOG_TABLE = 'kv_log';

interface RecordRow {
  value: string | Record<string, unknown>;
}

// mysql2 hands JSON columns back already parsed
function decode(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

/**
 * MySQL-backed store. `kv_records` holds one row per (namespace, key) and is
 * upserted in a single statement; `kv_log` is insert-only with an
 * auto-increment id giving append order.
 */
export class KnexKeyValueStore implements KeyValueStore {
  readonly driver = 'mysql';

  constructor(private readonly db: Knex) {}

  async put(namespace: string, key: string, value: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    const now = new Date();
    await this.db(KV_RECORDS_TABLE)
      .insert({
        namespace,
        record_key: key,
        value: JSON.stringify(value),
        updated_at: now,
      })
      .onConflict(['namespace', 'record_key'])
      .merge(['value', 'updated_at']);
    return locator(namespace, key);
  }

  async append(namespace: string, key: string, entry: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    await this.db(KV_LOG_TABLE).insert({
      namespace,
      record_key: key,
      entry: JSON.stringify(entry),
      created_at: new Date(),
    });
    return locator(namespace, key);
  }

  async get(namespace: string, key: string): Promise<unknown | null> {
    assertSafeKey(namespace, key);
    const row: RecordRow | undefined = await this.db(KV_RECORDS_TABLE)
      .where({ namespace, record_key: key })
      .first('value');
    return row ? decode(row.value) : null;
  }

  async list(namespace: string, key: string): Promise<unknown[]> {
    assertSafeKey(namespace, key);
    const rows: Array<{ entry: unknown }> = await this.db(KV_LOG_TABLE)
      .where({ namespace, record_key: key })
      .orderBy('id', 'asc')
      .select('entry');
    return rows.map((row) => decode(row.entry));
  }

  async clear(namespace: string): Promise<void> {
    assertSafeNamespace(namespace);
    await this.db(KV_RECORDS_TABLE).where({ namespace }).delete();
  }
}
