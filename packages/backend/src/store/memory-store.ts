import { assertSafeKey, assertSafeNamespace, locator, type KeyValueStore } from './key-value-store.js';

/**
 * Ephemeral store for tests and one-off runs. Values are deep-copied on the
 * way in and out so callers cannot mutate stored records.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  readonly driver = 'memory';
  private readonly records = new Map<string, unknown>();
  private readonly logs = new Map<string, unknown[]>();

  async put(namespace: string, key: string, value: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    const id = locator(namespace, key);
    this.records.set(id, structuredClone(value));
    return id;
  }

  async append(namespace: string, key: string, entry: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    const id = locator(namespace, key);
    const log = this.logs.get(id) ?? [];
    log.push(structuredClone(entry));
    this.logs.set(id, log);
    return id;
  }

  async get(namespace: string, key: string): Promise<unknown | null> {
    assertSafeKey(namespace, key);
    const id = locator(namespace, key);
    return this.records.has(id) ? structuredClone(this.records.get(id)) : null;
  }

  async list(namespace: string, key: string): Promise<unknown[]> {
    assertSafeKey(namespace, key);
    return structuredClone(this.logs.get(locator(namespace, key)) ?? []);
  }

  async clear(namespace: string): Promise<void> {
    assertSafeNamespace(namespace);
    const prefix = `${namespace}/`;
    for (const id of [...this.records.keys()]) {
      if (id.startsWith(prefix) && !id.slice(prefix.length).includes('/')) this.records.delete(id);
    }
  }

  /** Every locator written with `put`, in insertion order. */
  keys(): string[] {
    return [...this.records.keys()];
  }
}
