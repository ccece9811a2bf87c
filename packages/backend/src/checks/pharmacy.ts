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

const INVENTORY_FILE = 'pharmacy_inventory.json';
const INTERACTIONS_FILE = 'drug_interaction_rules.json';
const PATIENTS_FILE = 'patients.json';

export class PharmacyCheck extends LlmCheckProvider {
  readonly name = 'Pharmacy';
  readonly issuePrefix = 'PHARM_';
  readonly referenceFiles = [INVENTORY_FILE, INTERACTIONS_FILE, PATIENTS_FILE];

  protected buildPrompt(patientId: string, reference: ReferenceData): string {
    const patient = asRecord(reference[PATIENTS_FILE]);
    return `You are the Pharmacy Verification Agent for hospital discharge.
Verify medication safety and readiness for discharge of patient ${patientId}.

${section('PATIENT MEDICATIONS', patient.active_medications)}

PATIENT ALLERGIES:
${asString(patient.allergies, 'None')}

${section('PHARMACY INVENTORY & ORDERS', reference[INVENTORY_FILE])}

${section('DRUG INTERACTION RULES', reference[INTERACTIONS_FILE])}

VERIFICATION TASKS:
1. Check for pending medication orders (status != "dispensed")
2. Verify there are no allergy-medication conflicts
3. Check for critical drug interactions
4. Verify discharge medication payment status
5. Check for duplicate medications

ISSUE CODES:
- PHARM_ORDER_PENDING: Medication order not dispensed
- PHARM_ALLERGY_CONFLICT: Medication conflicts with allergy
- PHARM_INTERACTION_CRITICAL: Critical drug interaction found
- PHARM_PAYMENT_PENDING: Discharge medication payment required
- PHARM_DUPLICATE: Duplicate medications detected

Set noc=false for allergy conflicts, critical interactions or pending orders.
Set noc=true if all medications are dispensed and there are no safety issues.`;
  }

  fallback(_patientId: string, reference: ReferenceData): CheckResult {
    const inventory = reference[INVENTORY_FILE];
    const rules = asRecord(reference[INTERACTIONS_FILE]);
    const patient = asRecord(reference[PATIENTS_FILE]);
    const issues: Issue[] = [];

    if (hasData(inventory)) {
      for (const order of asArray(inventory.active_orders).map(asRecord)) {
        if (order.status !== 'pending') continue;
        const orderId = asString(order.order_id);
        const medication = asString(order.medication_name);
        issues.push(
          this.issue({
            code: 'PHARM_ORDER_PENDING',
            title: 'Pending Medication Order',
            severity: 'high',
            message: `Medication '${medication}' order is pending dispense`,
            suggestedAction: 'Dispense medication before discharge',
            evidence: [formatEvidencePath(`data/${INVENTORY_FILE}`, `active_orders[${orderId}]`)],
            data: { order_id: orderId, medication },
          }),
        );
      }

      const cost = asNumber(inventory.total_discharge_medication_cost);
      if (cost > 0) {
        issues.push(
          this.issue({
            code: 'PHARM_PAYMENT_PENDING',
            title: 'Discharge Medication Payment Required',
            severity: 'medium',
            message: `Patient needs to pay ${cost} for discharge medications`,
            suggestedAction: `Collect ${cost} from patient/family before discharge`,
            evidence: [formatEvidencePath(`data/${INVENTORY_FILE}`, 'total_discharge_medication_cost')],
            data: { amount: cost },
          }),
        );
      }
    }

    const allergies = asString(patient.allergies);
    const allergyText = allergies.toLowerCase();
    if (allergyText !== '') {
      const medications = asArray(patient.active_medications).map(asRecord);
      for (const rule of asArray(rules.allergy_contraindications).map(asRecord)) {
        const allergy = asString(rule.allergy).toLowerCase();
        if (allergy === '' || !allergyText.includes(allergy)) continue;
        const drugs = asArray(rule.contraindicated_drugs).map((d) => asString(d).toLowerCase()).filter(Boolean);

        for (const med of medications) {
          const medName = asString(med.name);
          if (!drugs.some((drug) => medName.toLowerCase().includes(drug))) continue;
          issues.push(
            this.issue({
              code: 'PHARM_ALLERGY_CONFLICT',
              title: 'Allergy-Medication Conflict',
              severity: 'critical',
              message: `Patient has a recorded ${allergy} condition but is on ${medName} which may be contraindicated`,
              suggestedAction: 'Consult physician for alternative medication',
              evidence: [formatEvidencePath(`data/${PATIENTS_FILE}`, 'active_medications')],
              data: { medication: medName, allergy: allergies },
            }),
          );
        }
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
