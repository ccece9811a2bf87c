import type { FastifyInstance } from 'fastify';
import { createApp } from '../../app.js';
import type { DischargeOrchestrator } from '../../engine/orchestrator.js';

/**
 * Build a Fastify app instance configured for testing.
 *
 * Uses Fastify's built-in inject() for lightweight HTTP testing
 * without actually binding to a port.
 */
export async function buildTestApp(
  orchestrator: DischargeOrchestrator,
  storageDriver = 'memory',
): Promise<FastifyInstance> {
  return createApp({
    orchestrator,
    storageDriver,
    corsOrigins: ['http://localhost:5173'],
    logLevel: 'silent',
  });
}
