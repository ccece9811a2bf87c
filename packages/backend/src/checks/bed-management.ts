import { formatEvidencePath, type CheckResult, type Issue } from '@discharge/shared';
import { LlmCheckProvider, section } from './llm-check-provider.js';
import { asNumber, asRecord, asString, buildResult, hasBlockingIssue, hasData, type ReferenceData } from './provider.js';

const BILLING_FILE = 'billing_snapshot.json';
const HOUSEKEEPING_FILE = 'housekeeping_schedule.json';
const BILLING_EVIDENCE = `data/${BILLING_FILE}`;

export class BedManagementCheck extends LlmCheckProvider {
  readonly name = 'Bed Management';
  readonly issuePrefix = 'BED_';
  readonly referenceFiles = [BILLING_FILE, HOUSEKEEPING_FILE];

  protected buildPrompt(patientId: string, reference: ReferenceData): string {
    return `You are the Bed Management & Billing Agent for hospital discharge.
Verify that billing is settled and the bed can be turned over for patient ${patientId}.

${section('BILLING SNAPSHOT', reference[BILLING_FILE])}

${section('HOUSEKEEPING SCHEDULE', reference[HOUSEKEEPING_FILE])}

VERIFICATION TASKS:
1. Check the final invoice has been generated
2. Check payments required before discharge
3. Identify deposit refunds due
4. Check terminal cleaning is scheduled

ISSUE CODES:
- BED_INVOICE_PENDING: Final invoice not generated
- BED_DEPOSIT_SHORTFALL: Payment required before discharge
- BED_REFUND_DUE: Deposit refund due to patient
- BED_CLEANUP_DELAY: Housekeeping not scheduled

Set noc=false when the invoice is pending or payment is outstanding.`;
  }

  fallback(_patientId: string, reference: ReferenceData): CheckResult {
    const billing = reference[BILLING_FILE];
    const housekeeping = asRecord(reference[HOUSEKEEPING_FILE]);
    const issues: Issue[] = [];

    if (!hasData(billing)) {
      issues.push(
        this.issue({
          code: 'BED_INVOICE_PENDING',
          title: 'Billing Data Missing',
          severity: 'high',
          message: 'Unable to verify billing status - billing snapshot not available',
          suggestedAction: 'Generate final invoice through billing system',
          evidence: [BILLING_EVIDENCE],
        }),
      );
    } else {
      const invoice = asRecord(billing.invoice_status);
      if (invoice.invoice_generated !== true) {
        const status = asString(invoice.status, 'pending');
        issues.push(
          this.issue({
            code: 'BED_INVOICE_PENDING',
            title: 'Final Invoice Not Generated',
            severity: 'high',
            message: `Invoice status: ${status}`,
            suggestedAction: 'Generate final invoice via Billing UI before discharge',
            evidence: [formatEvidencePath(BILLING_EVIDENCE, 'invoice_status.invoice_generated')],
            data: { status },
          }),
        );
      }

      const required = asNumber(asRecord(billing.payments).required_before_discharge);
      const refund = asNumber(asRecord(billing.deposit_analysis).refund_due);
      if (required > 0) {
        issues.push(
          this.issue({
            code: 'BED_DEPOSIT_SHORTFALL',
            title: 'Payment Required Before Discharge',
            severity: 'high',
            message: `Patient needs to pay ${required} before discharge`,
            suggestedAction: `Collect ${required} from patient/family`,
            evidence: [formatEvidencePath(BILLING_EVIDENCE, 'payments.required_before_discharge')],
            data: { amount: required },
          }),
        );
      } else if (refund > 0) {
        issues.push(
          this.issue({
            code: 'BED_REFUND_DUE',
            title: 'Deposit Refund Due',
            severity: 'low',
            message: `Refund of ${refund} due to patient`,
            suggestedAction: 'Process refund after final invoice generation',
            evidence: [formatEvidencePath(BILLING_EVIDENCE, 'deposit_analysis.refund_due')],
            data: { refund_amount: refund },
          }),
        );
      }

      if (!Array.isArray(housekeeping.cleaning_schedule) || housekeeping.cleaning_schedule.length === 0) {
        issues.push(
          this.issue({
            code: 'BED_CLEANUP_DELAY',
            title: 'Housekeeping Not Scheduled',
            severity: 'medium',
            message: 'Bed cleaning schedule not found',
            suggestedAction: 'Schedule terminal cleaning for bed turnover',
            evidence: [`data/${HOUSEKEEPING_FILE}`],
          }),
        );
      }
    }

    return buildResult(this.name, {
      cleared: !hasBlockingIssue(issues),
      confidence: 0.75,
      issues,
      rawDetail: { fallback: true },
    });
  }
}
