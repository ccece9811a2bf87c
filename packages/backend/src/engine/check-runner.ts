import { CheckResultSchema, type CheckName, type CheckResult } from '@discharge/shared';
import type { Logger } from '../logger.js';
import { MalformedProviderOutputError, ProviderError, ProviderTimeoutError, describeError } from '../errors.js';
import type { CheckProvider, ReferenceData, ReferenceDataSource } from '../checks/provider.js';
import { BoundedPool, TimeoutError, withTimeout } from './bounded-pool.js';

export interface CheckRunnerDeps {
  referenceData: ReferenceDataSource;
  logger: Logger;
  timeoutMs: number;
  maxConcurrency: number;
  /** Injectable clock for elapsed-time measurement. */
  now?: () => number;
}

/**
 * Runs every provider concurrently and never lets one provider's failure
 * reach the caller. Results come back keyed and ordered by the order the
 * providers were given in, whatever order they finished in.
 */
export class CheckRunner {
  private readonly pool: BoundedPool;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: CheckRunnerDeps) {
    this.pool = new BoundedPool(deps.maxConcurrency);
    this.log = deps.logger.child({ component: 'check-runner' });
    this.now = deps.now ?? (() => performance.now());
  }

  async run(patientId: string, providers: readonly CheckProvider[]): Promise<Map<CheckName, CheckResult>> {
    const seen = new Set<CheckName>();
    for (const p of providers) {
      if (seen.has(p.name)) throw new Error(`Duplicate check provider: ${p.name}`);
      seen.add(p.name);
    }

    const settled = await Promise.all(
      providers.map((provider) => this.pool.execute(() => this.runOne(patientId, provider))),
    );

    const results = new Map<CheckName, CheckResult>();
    providers.forEach((provider, i) => {
      const result = settled[i];
      if (result) results.set(provider.name, result);
    });
    return results;
  }

  /**
   * One deadline covers the reference load and `verify`; the fallback gets
   * its own. Whatever reference data arrived in time is handed to the
   * fallback.
   */
  private async runOne(patientId: string, provider: CheckProvider): Promise<CheckResult> {
    const started = this.now();
    let reference: ReferenceData = {};

    let result: CheckResult;
    try {
      const output = await withTimeout(
        this.loadReference(patientId, provider).then((loaded) => {
          reference = loaded;
          return provider.verify(patientId, loaded);
        }),
        this.deps.timeoutMs,
      );
      result = this.validate(provider, output);
    } catch (err) {
      const reason = this.toProviderFailure(provider, err);
      this.log.warn(
        { check: provider.name, patientId, code: reason.code, reason: reason.message },
        'Check provider failed; using fallback',
      );
      result = await this.runFallback(patientId, provider, reference);
    }

    return this.finalize(provider, result, this.now() - started);
  }

  private async loadReference(patientId: string, provider: CheckProvider): Promise<ReferenceData> {
    try {
      return await this.deps.referenceData.load(patientId, provider.referenceFiles);
    } catch (err) {
      this.log.warn(
        { check: provider.name, patientId, reason: describeError(err) },
        'Reference data unavailable; continuing with empty reference',
      );
      return {};
    }
  }

  private validate(provider: CheckProvider, output: unknown): CheckResult {
    const parsed = CheckResultSchema.safeParse(output);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'invalid';
      throw new MalformedProviderOutputError(provider.name, where);
    }
    if (parsed.data.checkName !== provider.name) {
      throw new MalformedProviderOutputError(
        provider.name,
        `result names check "${parsed.data.checkName}"`,
      );
    }
    return parsed.data;
  }

  private toProviderFailure(
    provider: CheckProvider,
    err: unknown,
  ): ProviderError | MalformedProviderOutputError {
    if (err instanceof MalformedProviderOutputError || err instanceof ProviderError) return err;
    if (err instanceof TimeoutError) return new ProviderTimeoutError(provider.name, err.timeoutMs);
    return new ProviderError(provider.name, describeError(err), { cause: err });
  }

  private async runFallback(
    patientId: string,
    provider: CheckProvider,
    reference: ReferenceData,
  ): Promise<CheckResult> {
    try {
      return await withTimeout(
        Promise.resolve().then(() => provider.fallback(patientId, reference)),
        this.deps.timeoutMs,
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        const reason = `fallback timed out after ${err.timeoutMs}ms`;
        this.log.error({ check: provider.name, patientId, reason }, 'Check fallback timed out');
        return unavailableResult(provider, reason);
      }
      this.log.error(
        { check: provider.name, patientId, reason: describeError(err) },
        'Check fallback failed; marking check unavailable',
      );
      return unavailableResult(provider, describeError(err));
    }
  }

  /** Stamp the measured time and the owning check on every issue. */
  private finalize(provider: CheckProvider, result: CheckResult, elapsedMs: number): CheckResult {
    return {
      checkName: provider.name,
      cleared: result.cleared,
      confidence: result.confidence,
      issues: result.issues.map((issue) => ({ ...issue, sourceCheck: provider.name })),
      elapsedMs: Math.max(0, elapsedMs),
      rawDetail: result.rawDetail,
    };
  }
}

/** Conservative result used when neither verify nor fallback produced one. */
export function unavailableResult(provider: CheckProvider, reason: string): CheckResult {
  return {
    checkName: provider.name,
    cleared: false,
    confidence: 0,
    issues: [
      {
        code: `${provider.issuePrefix}CHECK_UNAVAILABLE`,
        title: `${provider.name} Check Unavailable`,
        severity: 'high',
        message: `The ${provider.name} check could not be completed: ${reason}`,
        suggestedAction: `Verify ${provider.name.toLowerCase()} status manually before discharge`,
        evidence: [],
        data: { reason },
        sourceCheck: provider.name,
      },
    ],
    elapsedMs: 0,
    rawDetail: { unavailable: true },
  };
}
