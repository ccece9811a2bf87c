import { z } from 'zod';

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const CheckNameSchema = z.enum(['Insurance', 'Pharmacy', 'Transport', 'Bed Management', 'Lab']);

export const IssueSchema = z.object({
  code: z.string().min(1),
  title: z.string(),
  severity: SeveritySchema,
  message: z.string(),
  suggestedAction: z.string(),
  evidence: z.array(z.string()),
  data: z.record(z.unknown()),
  sourceCheck: CheckNameSchema,
});

export const CheckResultSchema = z.object({
  checkName: CheckNameSchema,
  cleared: z.boolean(),
  confidence: z.number().min(0).max(1),
  issues: z.array(IssueSchema),
  elapsedMs: z.number().min(0),
  rawDetail: z.record(z.unknown()),
});

