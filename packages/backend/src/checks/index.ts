import type { ConverseClient } from '../llm/converse-client.js';
import type { CheckProvider } from './provider.js';
import { InsuranceCheck } from './insurance.js';
import { PharmacyCheck } from './pharmacy.js';
import { TransportCheck } from './transport.js';
import { BedManagementCheck } from './bed-management.js';
import { LabCheck } from './lab.js';

/**
 * The five discharge checks in declaration order. Without a model client
 * every `verify` fails fast and the rule-based fallbacks answer.
 */
export function createDefaultProviders(client: ConverseClient | null): CheckProvider[] {
  return [
    new InsuranceCheck(client),
    new PharmacyCheck(client),
    new TransportCheck(client),
    new BedManagementCheck(client),
    new LabCheck(client),
  ];
}

export { InsuranceCheck, PharmacyCheck, TransportCheck, BedManagementCheck, LabCheck };
