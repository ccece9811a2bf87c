import { DischargeSummarySchema, type CheckName, type CheckResult, type DischargeSummary } from '@discharge/shared';
import { z } from 'zod';
import { NarrativeError, describeError } from '../errors.js';
import { parseModelJson, type ConverseClient } from '../llm/converse-client.js';
import type { DecisionDraft, NarrativeGenerator } from './narrative.js';

const SYSTEM_PROMPT = 'You are a hospital discharge coordinator. You write short, accurate discharge summaries.';

// The model answers in snake_case; accept either spelling
const ModelSummarySchema = z.union([
  DischargeSummarySchema,
  z
    .object({ plain_text: z.string(), for_medical_record: z.string() })
    .transform((v) => ({ plainText: v.plain_text, clinicalText: v.for_medical_record })),
]);

const MAX_SECTION_CHARS = 1000;

export function buildSummaryPrompt(
  patientId: string,
  checkResults: ReadonlyMap<CheckName, CheckResult>,
  draft: DecisionDraft,
): string {
  const checks = [...checkResults.values()].map((r) => ({
    check: r.checkName,
    cleared: r.cleared,
    confidence: r.confidence,
    issueCodes: r.issues.map((i) => i.code),
  }));
  const issues = draft.issues.map((i) => ({
    check: i.sourceCheck,
    code: i.code,
    severity: i.severity,
    title: i.title,
  }));

  return `Generate a discharge summary based on the check results below.

PATIENT ID: ${patientId}

CHECK RESULTS:
${JSON.stringify(checks, null, 2).slice(0, MAX_SECTION_CHARS)}

ALL ISSUES:
${JSON.stringify(issues, null, 2).slice(0, MAX_SECTION_CHARS)}

FINAL DECISION: ${draft.outcome}

Write TWO summaries:

1. PLAIN TEXT (for patient/family): simple, non-technical language. If approved, explain discharge is ready and the next steps. If on hold, explain what is blocking and what needs to happen. If pending, explain the minor items being resolved.

2. FOR MEDICAL RECORD (for clinicians): professional summary with key findings from each check, pending items and follow-up, referencing issue codes.

Return ONLY valid JSON (no markdown):
{
  "plain_text": "Patient-friendly summary paragraph",
  "for_medical_record": "Professional clinical summary"
}`;
}

export class BedrockNarrativeGenerator implements NarrativeGenerator {
  constructor(private readonly client: ConverseClient) {}

  async generateSummary(
    patientId: string,
    checkResults: ReadonlyMap<CheckName, CheckResult>,
    draft: DecisionDraft,
  ): Promise<DischargeSummary> {
    let text: string;
    try {
      text = await this.client.converse({
        system: SYSTEM_PROMPT,
        prompt: buildSummaryPrompt(patientId, checkResults, draft),
      });
    } catch (err) {
      throw new NarrativeError(`Summary model call failed: ${describeError(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = parseModelJson(text);
    } catch (err) {
      throw new NarrativeError('Summary model returned non-JSON output', { cause: err });
    }

    const parsed = ModelSummarySchema.safeParse(json);
    if (!parsed.success) {
      throw new NarrativeError('Summary model output is missing plain_text or for_medical_record');
    }
    return parsed.data;
  }
}
