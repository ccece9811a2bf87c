import type { FastifyInstance } from 'fastify';
import type { Decision } from '@discharge/shared';
import type { DischargeOrchestrator } from '../engine/orchestrator.js';
import { countByDepartment } from '../engine/escalation-router.js';
import { PersistenceError } from '../errors.js';

export interface DischargeRoutesOptions {
  orchestrator: DischargeOrchestrator;
}

const patientIdSchema = {
  type: 'string' as const,
  minLength: 1,
  maxLength: 64,
  pattern: '^[A-Za-z0-9._-]+$',
  description: 'Patient identifier',
};

const errorSchema = {
  type: 'object' as const,
  properties: { detail: { type: 'string' } },
};

const verifyResponseSchema = {
  type: 'object' as const,
  properties: {
    patientId: { type: 'string' },
    status: { type: 'string', enum: ['APPROVE', 'HOLD', 'PENDING_AUTO_RESOLUTION'] },
    approved: { type: 'boolean' },
    timestamp: { type: 'string' },
    summary: { type: 'string' },
    alertsCount: {
      type: 'object',
      properties: {
        total: { type: 'integer' },
        critical: { type: 'integer' },
        high: { type: 'integer' },
        medium: { type: 'integer' },
        low: { type: 'integer' },
      },
    },
    escalations: {
      type: 'object',
      properties: {
        lab: { type: 'integer' },
        pharmacy: { type: 'integer' },
        billing: { type: 'integer' },
        transport: { type: 'integer' },
        insurance: { type: 'integer' },
        general: { type: 'integer' },
      },
    },
    details: {
      type: 'object',
      additionalProperties: true,
      properties: {
        approvedBy: { type: 'array', items: { type: 'string' } },
        blockedBy: { type: 'array', items: { type: 'string' } },
        suggestedAutoResolutions: { type: 'array', items: { type: 'object', additionalProperties: true } },
      },
    },
  },
};

export interface VerifyResponse {
  patientId: string;
  status: Decision['outcome'];
  approved: boolean;
  timestamp: string;
  summary: string;
  alertsCount: { total: number; critical: number; high: number; medium: number; low: number };
  escalations: ReturnType<typeof countByDepartment>;
  details: {
    approvedBy: Decision['clearedBy'];
    blockedBy: Decision['blockedBy'];
    suggestedAutoResolutions: Decision['suggestedResolutions'];
  };
}

export function toVerifyResponse(decision: Decision): VerifyResponse {
  const bySeverity = (severity: string) => decision.issues.filter((i) => i.severity === severity).length;
  return {
    patientId: decision.patientId,
    status: decision.outcome,
    approved: decision.approved,
    timestamp: decision.timestamp,
    summary: decision.summary.plainText || 'No summary available',
    alertsCount: {
      total: decision.issues.length,
      critical: bySeverity('critical'),
      high: bySeverity('high'),
      medium: bySeverity('medium'),
      low: bySeverity('low'),
    },
    escalations: countByDepartment(decision.issues),
    details: {
      approvedBy: decision.clearedBy,
      blockedBy: decision.blockedBy,
      suggestedAutoResolutions: decision.suggestedResolutions,
    },
  };
}

export default async function dischargeRoutes(app: FastifyInstance, opts: DischargeRoutesOptions) {
  const { orchestrator } = opts;

  // POST /discharge/verify: run every check and return the decision
  app.post<{ Body: { patientId: string } }>(
    '/discharge/verify',
    {
      schema: {
        tags: ['Discharge'],
        summary: 'Verify discharge readiness',
        description: 'Runs all discharge checks for a patient, persists the decision and routes escalations.',
        body: {
          type: 'object',
          required: ['patientId'],
          properties: { patientId: patientIdSchema },
        },
        response: {
          200: { description: 'Discharge decision', ...verifyResponseSchema },
          500: { description: 'Verification failed', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const { patientId } = request.body;
      try {
        const { decision } = await orchestrator.runDischargeVerification(patientId);
        return reply.send(toVerifyResponse(decision));
      } catch (err) {
        request.log.error({ err, patientId }, 'Discharge verification failed');
        const body =
          err instanceof PersistenceError
            ? err.toClientJSON()
            : { detail: 'Workflow execution failed: internal error' };
        return reply.status(500).send(body);
      }
    },
  );

  // GET /discharge/:patientId/state: current persisted decision
  app.get<{ Params: { patientId: string } }>(
    '/discharge/:patientId/state',
    {
      schema: {
        tags: ['Discharge'],
        summary: 'Get discharge state',
        description: 'Returns the latest persisted decision for a patient and whether its approval has lapsed.',
        params: {
          type: 'object',
          required: ['patientId'],
          properties: { patientId: patientIdSchema },
        },
        response: {
          200: {
            description: 'Persisted state',
            type: 'object',
            properties: {
              state: { type: 'object', additionalProperties: true },
              expired: { type: 'boolean' },
            },
          },
          404: { description: 'No state recorded', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const { patientId } = request.params;
      const state = await orchestrator.stateStore.load(patientId);
      if (!state) {
        return reply.status(404).send({ detail: `No discharge state for patient ${patientId}` });
      }
      const expired = await orchestrator.stateStore.isExpired(patientId);
      return reply.send({ state, expired });
    },
  );

  // GET /discharge/:patientId/audit: append-only audit trail
  app.get<{ Params: { patientId: string } }>(
    '/discharge/:patientId/audit',
    {
      schema: {
        tags: ['Discharge'],
        summary: 'Get audit trail',
        description: 'Returns every audit entry recorded for a patient, oldest first.',
        params: {
          type: 'object',
          required: ['patientId'],
          properties: { patientId: patientIdSchema },
        },
        response: {
          200: {
            description: 'Audit entries',
            type: 'object',
            properties: {
              patientId: { type: 'string' },
              entries: { type: 'array', items: { type: 'object', additionalProperties: true } },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const { patientId } = request.params;
      const entries = await orchestrator.stateStore.loadAudit(patientId);
      return reply.send({ patientId, entries });
    },
  );
}
