/**
 * Durable key-value port used by the state store and the escalation router.
 *
 * `put`/`get` hold one current record per key (last write wins).
 * `append`/`list` hold an ordered, append-only sequence per key.
 * `clear` drops every current record directly under a namespace; append
 * sequences are never removed.
 * Implementations must make `put` atomic: a reader sees either the previous
 * record or the new one, never a partial write.
 */
export interface KeyValueStore {
  readonly driver: string;
  put(namespace: string, key: string, value: unknown): Promise<string>;
  append(namespace: string, key: string, entry: unknown): Promise<string>;
  get(namespace: string, key: string): Promise<unknown | null>;
  list(namespace: string, key: string): Promise<unknown[]>;
  clear(namespace: string): Promise<void>;
}

/** Locator string returned by writes, e.g. `state/P00231`. */
export function locator(namespace: string, key: string): string {
  return `${namespace}/${key}`;
}

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

/**
 * Namespaces may nest with `/`; every segment, and the key, is restricted
 * to a filesystem- and SQL-safe alphabet.
 */
export function assertSafeKey(namespace: string, key: string): void {
  for (const segment of [...namespace.split('/'), key]) {
    if (!isSafeSegment(segment)) {
      throw new Error(`Invalid store key segment "${segment}" in ${namespace}/${key}`);
    }
  }
}

export function assertSafeNamespace(namespace: string): void {
  for (const segment of namespace.split('/')) {
    if (!isSafeSegment(segment)) {
      throw new Error(`Invalid store namespace segment "${segment}" in ${namespace}`);
    }
  }
}

function isSafeSegment(segment: string): boolean {
  return SAFE_SEGMENT.test(segment) && segment !== '.' && segment !== '..';
}
