import type { FastifyInstance } from 'fastify';

export interface HealthRoutesOptions {
  storageDriver: string;
}

export default async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  // GET /health: liveness
  app.get(
    '/health',
    {
      schema: {
        tags: ['Admin'],
        summary: 'Health check',
        description: 'Returns service status and the configured storage driver.',
        response: {
          200: {
            description: 'Health status',
            type: 'object',
            properties: {
              status: { type: 'string' },
              storage: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ status: 'ok', storage: opts.storageDriver });
    },
  );
}
