import { z } from 'zod';
import { CheckNameSchema, IssueSchema, SeveritySchema } from './check.schema.js';

export const DecisionOutcomeSchema = z.enum(['APPROVE', 'HOLD', 'PENDING_AUTO_RESOLUTION']);

export const SuggestedResolutionSchema = z.object({
  action: z.string(),
  detail: z.object({
    sourceCheck: CheckNameSchema,
    code: z.string(),
    severity: SeveritySchema,
    data: z.record(z.unknown()),
  }),
});

export const DischargeSummarySchema = z.object({
  plainText: z.string(),
  clinicalText: z.string(),
});

export const DecisionSchema = z.object({
  patientId: z.string().min(1),
  outcome: DecisionOutcomeSchema,
  approved: z.boolean(),
  clearedBy: z.array(CheckNameSchema),
  blockedBy: z.array(CheckNameSchema),
  issues: z.array(IssueSchema),
  suggestedResolutions: z.array(SuggestedResolutionSchema),
  summary: DischargeSummarySchema,
  timestamp: z.string(),
});

export const PersistedStateSchema = z.object({
  patientId: z.string().min(1),
  status: z.enum(['approved', 'hold', 'pending_auto_resolution']),
  decision: DecisionSchema,
  expiresAt: z.string().optional(),
  createdAt: z.string(),
  lastUpdatedAt: z.string(),
  version: z.string(),
});

export const AuditEntrySchema = z.object({
  timestamp: z.string(),
  patientId: z.string().min(1),
  outcome: DecisionOutcomeSchema,
  issueCount: z.number().int().min(0),
  criticalIssues: z.array(IssueSchema),
  recommendedNextSteps: z.array(z.string()),
});

