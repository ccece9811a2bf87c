import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { isRecord, type ReferenceData, type ReferenceDataSource } from './provider.js';

/**
 * Reads `<dir>/<file>` for each requested file. A file holds either one
 * shared object (e.g. a provider directory) or a list of per-patient records
 * tagged with `patient_id`. Missing, unreadable, or non-matching files are
 * left out of the result.
 */
export class JsonReferenceDataSource implements ReferenceDataSource {
  constructor(
    private readonly dir: string,
    private readonly logger?: Logger,
  ) {}

  async load(patientId: string, files: readonly string[]): Promise<ReferenceData> {
    const entries = await Promise.all(
      files.map(async (file): Promise<[string, unknown] | null> => {
        const content = await this.readJson(file);
        const record = selectPatientRecord(content, patientId);
        return record === undefined ? null : [file, record];
      }),
    );

    const reference: Record<string, unknown> = {};
    for (const entry of entries) {
      if (entry) reference[entry[0]] = entry[1];
    }
    return reference;
  }

  private async readJson(file: string): Promise<unknown> {
    try {
      const raw = await readFile(join(this.dir, file), 'utf8');
      return JSON.parse(raw);
    } catch (err) {
      this.logger?.debug({ file, reason: describeError(err) }, 'Reference file unavailable');
      return undefined;
    }
  }
}

export function selectPatientRecord(content: unknown, patientId: string): unknown {
  if (Array.isArray(content)) {
    return content.find((item) => isRecord(item) && item.patient_id === patientId);
  }
  if (isRecord(content)) {
    if ('patient_id' in content && content.patient_id !== patientId) return undefined;
    return content;
  }
  return undefined;
}

/** Fixed reference data, for tests and embedding. */
export class StaticReferenceDataSource implements ReferenceDataSource {
  constructor(private readonly data: ReferenceData) {}

  async load(_patientId: string, files: readonly string[]): Promise<ReferenceData> {
    const reference: Record<string, unknown> = {};
    for (const file of files) {
      if (file in this.data) reference[file] = this.data[file];
    }
    return reference;
  }
}
