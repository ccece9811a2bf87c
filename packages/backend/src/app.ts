import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import type { DischargeOrchestrator } from './engine/orchestrator.js';
import dischargeRoutes from './routes/discharge.js';
import healthRoutes from './routes/health.js';

export interface AppOptions {
  orchestrator: DischargeOrchestrator;
  storageDriver: string;
  corsOrigins: string[];
}

async function appPlugin(app: FastifyInstance, opts: AppOptions) {
  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // Disabled for API; swagger-ui serves its own assets
  });

  await app.register(cors, {
    origin: opts.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Rate limiting (in-memory store)
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // OpenAPI docs
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Discharge Clearance API',
        description: 'Multi-check patient discharge verification with department escalation',
        version: '1.0.0',
      },
    },
  });
  await app.register(swaggerUi, { routePrefix: '/docs' });

  // Route plugins
  await app.register(healthRoutes, { storageDriver: opts.storageDriver });
  await app.register(dischargeRoutes, { orchestrator: opts.orchestrator });

  // Global error handler
  app.setErrorHandler((err: FastifyError, _request: FastifyRequest, reply: FastifyReply) => {
    if (err.validation) {
      return reply.status(400).send({
        detail: `Invalid request ${err.validationContext ?? 'input'}`,
        errors: err.validation,
      });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ detail: err.message });
    }
    app.log.error(err, 'Unhandled error');
    return reply.status(500).send({ detail: 'Internal server error' });
  });

  app.setNotFoundHandler((_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send({ detail: 'Not found' });
  });
}

export default appPlugin;

export async function createApp(options: AppOptions & { logLevel?: string }): Promise<FastifyInstance> {
  const { logLevel = 'info', ...appOptions } = options;
  const app = Fastify({
    logger: { level: logLevel },
    genReqId: () => randomUUID(),
    bodyLimit: 1024 * 1024,
  });

  await app.register(appPlugin, appOptions);
  await app.ready();

  return app;
}
