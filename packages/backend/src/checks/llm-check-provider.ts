import { SeveritySchema, type CheckName, type CheckResult, type Issue, type Severity } from '@discharge/shared';
import { z } from 'zod';
import { MalformedProviderOutputError, ProviderError, describeError } from '../errors.js';
import { parseModelJson, type ConverseClient } from '../llm/converse-client.js';
import { buildIssue, buildResult, type CheckProvider, type IssueDraft, type ReferenceData } from './provider.js';

const SYSTEM_PROMPT =
  'You are a hospital discharge verification agent. Answer with a single JSON object and nothing else.';

const ModelIssueSchema = z.object({
  code: z.string().min(1),
  title: z.string().default(''),
  severity: z.string().default('medium'),
  message: z.string().default(''),
  suggested_action: z.string().default(''),
  evidence: z.unknown().optional(),
  data: z.record(z.unknown()).default({}),
});

const ModelVerdictSchema = z.object({
  noc: z.boolean(),
  confidence: z.number(),
  issues: z.array(ModelIssueSchema).default([]),
  raw_data: z.record(z.unknown()).default({}),
});

export function normalizeSeverity(value: string): Severity {
  const parsed = SeveritySchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : 'medium';
}

/** string -> [string]; object -> ["k: v", ...]; list -> each item as text. */
export function normalizeEvidence(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
  }
  if (typeof value === 'object') {
    return Object.entries(value).map(([k, v]) => `${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`);
  }
  return [String(value)];
}

const OUTPUT_CONTRACT = `OUTPUT REQUIREMENTS:
Return ONLY a valid JSON object with this exact structure (no markdown, no explanation):
{
  "noc": true or false,
  "confidence": 0.0 to 1.0,
  "issues": [
    {
      "code": "ISSUE_CODE",
      "title": "Short title",
      "severity": "low|medium|high|critical",
      "message": "Detailed explanation",
      "suggested_action": "What to do",
      "evidence": ["file_path#reference"],
      "data": {"key": "value"}
    }
  ],
  "raw_data": {}
}`;

/**
 * Base for checks verified by a chat model. Subclasses supply the prompt
 * body and the rule-based fallback over the same reference data.
 */
export abstract class LlmCheckProvider implements CheckProvider {
  abstract readonly name: CheckName;
  abstract readonly issuePrefix: string;
  abstract readonly referenceFiles: readonly string[];

  constructor(protected readonly client: ConverseClient | null) {}

  protected abstract buildPrompt(patientId: string, reference: ReferenceData): string;

  abstract fallback(patientId: string, reference: ReferenceData): CheckResult;

  protected issue(draft: IssueDraft): Issue {
    return buildIssue(this.name, draft);
  }

  buildFullPrompt(patientId: string, reference: ReferenceData): string {
    return `${this.buildPrompt(patientId, reference)}\n\n${OUTPUT_CONTRACT}`;
  }

  async verify(patientId: string, reference: ReferenceData): Promise<CheckResult> {
    if (!this.client) {
      throw new ProviderError(this.name, 'no model client configured');
    }

    const text = await this.client.converse({
      system: SYSTEM_PROMPT,
      prompt: this.buildFullPrompt(patientId, reference),
    });

    let json: unknown;
    try {
      json = parseModelJson(text);
    } catch (err) {
      throw new MalformedProviderOutputError(this.name, `response is not JSON (${describeError(err)})`);
    }

    const parsed = ModelVerdictSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new MalformedProviderOutputError(
        this.name,
        first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unexpected shape',
      );
    }

    const verdict = parsed.data;
    return buildResult(this.name, {
      cleared: verdict.noc,
      confidence: verdict.confidence,
      issues: verdict.issues.map((i) =>
        this.issue({
          code: i.code,
          title: i.title,
          severity: normalizeSeverity(i.severity),
          message: i.message,
          suggestedAction: i.suggested_action,
          evidence: normalizeEvidence(i.evidence),
          data: i.data,
        }),
      ),
      rawDetail: { ...verdict.raw_data, model: this.client.modelId },
    });
  }
}

export function section(title: string, value: unknown): string {
  return `${title}:\n${value === undefined ? 'Not available' : JSON.stringify(value, null, 2)}`;
}
