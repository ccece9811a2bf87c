import { formatEvidencePath, type CheckResult, type Issue } from '@discharge/shared';
import { LlmCheckProvider, section } from './llm-check-provider.js';
import { asArray, asRecord, asString, buildResult, hasBlockingIssue, hasData, type ReferenceData } from './provider.js';

const LAB_FILE = 'lab_results.json';
const LAB_EVIDENCE = `data/${LAB_FILE}`;

export class LabCheck extends LlmCheckProvider {
  readonly name = 'Lab';
  readonly issuePrefix = 'LAB_';
  readonly referenceFiles = [LAB_FILE, 'patients.json'];

  protected buildPrompt(patientId: string, reference: ReferenceData): string {
    return `You are the Laboratory Verification Agent for hospital discharge.
Verify that all required tests for patient ${patientId} are complete and safe for discharge.

${section('PATIENT RECORD', reference['patients.json'])}

${section('LAB RESULTS', reference[LAB_FILE])}

VERIFICATION TASKS:
1. Confirm every required test has a result
2. Identify tests still pending
3. Identify component values flagged critical

ISSUE CODES:
- LAB_PENDING: Required test missing or pending
- LAB_CRITICAL_VALUE: Critical value requires physician review
- LAB_ABNORMAL_VALUE: Abnormal (non-critical) value worth noting

Set noc=false for pending required tests or critical values.`;
  }

  fallback(_patientId: string, reference: ReferenceData): CheckResult {
    const labs = reference[LAB_FILE];
    const issues: Issue[] = [];

    if (!hasData(labs)) {
      issues.push(
        this.issue({
          code: 'LAB_DATA_MISSING',
          title: 'Lab Results Not Available',
          severity: 'high',
          message: 'Unable to verify lab tests - results database not available',
          suggestedAction: 'Retrieve lab results from laboratory system',
          evidence: [LAB_EVIDENCE],
        }),
      );
    } else {
      const results = asArray(labs.results).map(asRecord);
      for (const required of asArray(labs.required_tests).map((t) => asString(t))) {
        const match = results.find((r) => r.test_name === required);
        if (!match) {
          issues.push(
            this.issue({
              code: 'LAB_PENDING',
              title: `Missing Test: ${required}`,
              severity: 'high',
              message: `Required test '${required}' not found in results`,
              suggestedAction: 'Complete the required test before discharge',
              evidence: [formatEvidencePath(LAB_EVIDENCE, 'required_tests')],
            }),
          );
          continue;
        }

        const testId = asString(match.test_id);
        if (match.status === 'pending') {
          issues.push(
            this.issue({
              code: 'LAB_PENDING',
              title: `Pending Test: ${required}`,
              severity: 'high',
              message: `Test '${required}' is still pending`,
              suggestedAction: 'Wait for test completion or expedite processing',
              evidence: [formatEvidencePath(LAB_EVIDENCE, `results[${testId}]`)],
              data: { test_id: testId },
            }),
          );
          continue;
        }

        for (const component of asArray(match.components).map(asRecord)) {
          if (component.flag !== 'critical') continue;
          const name = asString(component.name);
          issues.push(
            this.issue({
              code: 'LAB_CRITICAL_VALUE',
              title: `Critical Value: ${name}`,
              severity: 'critical',
              message: `${name} = ${asString(component.value)} ${asString(component.units)} (Reference: ${asString(component.reference_range)})`,
              suggestedAction: 'Consult physician before discharge - critical lab value requires review',
              evidence: [formatEvidencePath(LAB_EVIDENCE, `results[${testId}].components`)],
              data: {
                test: required,
                component: name,
                value: component.value ?? null,
                threshold: component.critical_threshold ?? null,
              },
            }),
          );
        }
      }
    }

    return buildResult(this.name, {
      cleared: !hasBlockingIssue(issues),
      confidence: 0.8,
      issues,
      rawDetail: { fallback: true },
    });
  }
}
