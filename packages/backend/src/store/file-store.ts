import { mkdir, readFile, readdir, rename, rm, writeFile, appendFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { assertSafeKey, assertSafeNamespace, locator, type KeyValueStore } from './key-value-store.js';
import { KeyedMutex } from './keyed-mutex.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON files under a base directory:
 *   <base>/<namespace>/<key>.json    current record
 *   <base>/<namespace>/<key>.jsonl   append-only log, one entry per line
 */
export class FileKeyValueStore implements KeyValueStore {
  readonly driver = 'file';
  private readonly appendLocks = new KeyedMutex();

  constructor(private readonly baseDir: string) {}

  private recordPath(namespace: string, key: string): string {
    return join(this.baseDir, ...namespace.split('/'), `${key}.json`);
  }

  private logPath(namespace: string, key: string): string {
    return join(this.baseDir, ...namespace.split('/'), `${key}.jsonl`);
  }

  async put(namespace: string, key: string, value: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    const target = this.recordPath(namespace, key);
    await mkdir(dirname(target), { recursive: true });

    // Write beside the target, then rename over it
    const temp = `${target}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(value, null, 2), 'utf8');
    await rename(temp, target);
    return locator(namespace, key);
  }

  async append(namespace: string, key: string, entry: unknown): Promise<string> {
    assertSafeKey(namespace, key);
    const target = this.logPath(namespace, key);
    await this.appendLocks.runExclusive(target, async () => {
      await mkdir(dirname(target), { recursive: true });
      await appendFile(target, `${JSON.stringify(entry)}\n`, 'utf8');
    });
    return locator(namespace, key);
  }

  async get(namespace: string, key: string): Promise<unknown | null> {
    assertSafeKey(namespace, key);
    try {
      const raw = await readFile(this.recordPath(namespace, key), 'utf8');
      return JSON.parse(raw);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async list(namespace: string, key: string): Promise<unknown[]> {
    assertSafeKey(namespace, key);
    let raw: string;
    try {
      raw = await readFile(this.logPath(namespace, key), 'utf8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return raw
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line): unknown => JSON.parse(line));
  }

  async clear(namespace: string): Promise<void> {
    assertSafeNamespace(namespace);
    const dir = join(this.baseDir, ...namespace.split('/'));
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      if (isMissing(err)) return;
      throw err;
    }
    await Promise.all(
      names.filter((name) => name.endsWith('.json')).map((name) => rm(join(dir, name), { force: true })),
    );
  }
}
