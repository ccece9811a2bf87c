import { toIsoTimestamp, type CheckName, type CheckResult, type Decision, type DischargeSummary } from '@discharge/shared';
import type { DischargeConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { DischargeError, PersistenceError, describeError } from '../errors.js';
import type { CheckProvider, ReferenceDataSource } from '../checks/provider.js';
import type { KeyValueStore } from '../store/key-value-store.js';
import { fallbackSummary, type DecisionDraft, type NarrativeGenerator } from '../narrative/narrative.js';
import { CheckRunner } from './check-runner.js';
import { aggregate } from './result-aggregator.js';
import { decideOutcome, resolveSuggestions } from './decision-engine.js';
import { EscalationRouter } from './escalation-router.js';
import { StateStore, buildAuditEntry } from './state-store.js';

export interface OrchestratorDeps {
  config: Pick<DischargeConfig, 'approvalWindow' | 'checks'>;
  providers: readonly CheckProvider[];
  referenceData: ReferenceDataSource;
  narrative: NarrativeGenerator;
  store: KeyValueStore;
  logger: Logger;
  clock?: () => Date;
}

export interface VerificationRun {
  decision: Decision;
  checkResults: ReadonlyMap<CheckName, CheckResult>;
  /** Locators of everything written: state, audit, escalation records. */
  artifacts: string[];
}

/**
 * Single entry point for a discharge run. Components hand immutable values
 * to one another; only persistence failures end a run early.
 */
export class DischargeOrchestrator {
  readonly runner: CheckRunner;
  readonly stateStore: StateStore;
  readonly router: EscalationRouter;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.logger.child({ component: 'orchestrator' });
    this.runner = new CheckRunner({
      referenceData: deps.referenceData,
      logger: deps.logger,
      timeoutMs: deps.config.checks.timeoutMs,
      maxConcurrency: deps.config.checks.maxConcurrency,
    });
    this.stateStore = new StateStore({
      store: deps.store,
      logger: deps.logger,
      approvalWindow: deps.config.approvalWindow,
      clock: this.clock,
    });
    this.router = new EscalationRouter({ store: deps.store, clock: this.clock });
  }

  async runDischargeVerification(patientId: string): Promise<VerificationRun> {
    this.log.info({ patientId, checks: this.deps.providers.length }, 'Discharge verification started');

    const checkResults = await this.runner.run(patientId, this.deps.providers);
    const { issues, clearedBy, blockedBy, clearedFlags } = aggregate(checkResults);
    const { outcome, approved } = decideOutcome(issues, clearedFlags);

    const draft: DecisionDraft = {
      patientId,
      outcome,
      approved,
      clearedBy,
      blockedBy,
      issues,
      suggestedResolutions: resolveSuggestions(issues, outcome),
    };
    const summary = await this.summarize(patientId, checkResults, draft);

    const decision: Decision = Object.freeze({
      ...draft,
      summary,
      timestamp: toIsoTimestamp(this.clock()),
    });

    const artifacts = await this.stateStore.withPatientLock(patientId, async () => {
      const { locator: stateLocator } = await this.stateStore.save(patientId, decision);
      const auditLocator = await this.stateStore.appendAudit(patientId, buildAuditEntry(decision));

      const bundle = this.router.route(patientId, decision.issues, decision.outcome);
      let escalationLocators: string[];
      try {
        escalationLocators = await this.router.persist(bundle);
      } catch (err) {
        throw new PersistenceError('write escalations for', patientId, { cause: err });
      }
      return [stateLocator, auditLocator, ...escalationLocators];
    });

    this.log.info(
      { patientId, outcome, issues: issues.length, blockedBy, artifacts: artifacts.length },
      'Discharge verification completed',
    );
    return { decision, checkResults, artifacts };
  }

  private async summarize(
    patientId: string,
    checkResults: ReadonlyMap<CheckName, CheckResult>,
    draft: DecisionDraft,
  ): Promise<DischargeSummary> {
    try {
      return await this.deps.narrative.generateSummary(patientId, checkResults, draft);
    } catch (err) {
      const code = err instanceof DischargeError ? err.code : 'narrative.failed';
      this.log.warn({ patientId, code, reason: describeError(err) }, 'Summary generation failed; using template');
      return fallbackSummary(checkResults, draft);
    }
  }
}
