import { formatEvidencePath, type CheckResult, type Issue } from '@discharge/shared';
import { LlmCheckProvider, section } from './llm-check-provider.js';
import {
  asArray,
  asNumber,
  asRecord,
  asString,
  buildResult,
  hasBlockingIssue,
  hasData,
  type ReferenceData,
} from './provider.js';

const INSURER_FILE = 'insurer_records.json';
const EVIDENCE_FILE = `data/${INSURER_FILE}`;

export class InsuranceCheck extends LlmCheckProvider {
  readonly name = 'Insurance';
  readonly issuePrefix = 'INS_';
  readonly referenceFiles = [INSURER_FILE, 'patients.json'];

  protected buildPrompt(patientId: string, reference: ReferenceData): string {
    return `You are the Insurance Verification Agent for a hospital discharge system.
Decide whether the patient's insurance gives a No Objection Certificate (NOC) for discharge of patient ${patientId}.

${section('PATIENT RECORD', reference['patients.json'])}

${section('INSURER RECORDS', reference[INSURER_FILE])}

VERIFICATION TASKS:
1. Check the policy is active for this admission
2. Verify pre-authorization status
3. Check coverage limits against the estimated bill
4. Identify exclusions or conditions
5. Calculate patient responsibility (co-pay, deductible)

ISSUE CODES TO USE:
- INS_POLICY_EXPIRED: Policy not active
- INS_PREAUTH_MISSING: Pre-authorization missing
- INS_LIMITS_EXCEEDED: Coverage limits insufficient
- INS_PARTIAL_COVERAGE: Partial coverage with patient responsibility
- INS_EXCLUSION_FOUND: Procedure excluded from coverage

Set noc=false for an expired policy, missing pre-authorization or insufficient limits.
Set noc=true if all checks pass or only minor items remain (co-pay collection).`;
  }

  fallback(_patientId: string, reference: ReferenceData): CheckResult {
    const records = reference[INSURER_FILE];
    const issues: Issue[] = [];

    if (!hasData(records)) {
      issues.push(
        this.issue({
          code: 'INS_DATA_MISSING',
          title: 'Insurance Records Missing',
          severity: 'high',
          message: 'Unable to verify insurance - insurer records not available',
          suggestedAction: 'Contact insurance desk to verify policy manually',
          evidence: [EVIDENCE_FILE],
        }),
      );
    } else {
      const policyStatus = asString(asRecord(records.policy_details).policy_status, 'unknown');
      if (policyStatus !== 'active') {
        issues.push(
          this.issue({
            code: 'INS_POLICY_EXPIRED',
            title: 'Policy Not Active',
            severity: 'critical',
            message: `Insurance policy status: ${policyStatus}`,
            suggestedAction: 'Contact insurance provider to reactivate policy',
            evidence: [formatEvidencePath(EVIDENCE_FILE, 'policy_details.policy_status')],
            data: { policy_status: policyStatus },
          }),
        );
      }

      const firstAuth = asRecord(asArray(records.pre_authorization_records)[0]);
      if (firstAuth.status !== 'approved') {
        issues.push(
          this.issue({
            code: 'INS_PREAUTH_MISSING',
            title: 'Pre-Authorization Missing',
            severity: 'high',
            message: 'No approved pre-authorization found for this admission',
            suggestedAction: 'Submit pre-authorization request to insurance',
            evidence: [formatEvidencePath(EVIDENCE_FILE, 'pre_authorization_records')],
          }),
        );
      }

      const responsibility = asNumber(asRecord(records.coverage).patient_responsibility);
      if (responsibility > 0) {
        issues.push(
          this.issue({
            code: 'INS_PARTIAL_COVERAGE',
            title: 'Patient Co-payment Due',
            severity: 'low',
            message: `Policy leaves ${responsibility} payable by the patient`,
            suggestedAction: `Collect ${responsibility} co-payment from patient/family`,
            evidence: [formatEvidencePath(EVIDENCE_FILE, 'coverage.patient_responsibility')],
            data: { amount: responsibility },
          }),
        );
      }
    }

    return buildResult(this.name, {
      cleared: !hasBlockingIssue(issues),
      confidence: 0.7,
      issues,
      rawDetail: { fallback: true },
    });
  }
}
