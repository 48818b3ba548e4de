import type { FastifyInstance } from 'fastify';
import type { KpiEngine } from '../../core/engine.js';
import { serializeRegistry, serializeStatus } from '../serialization.js';

export function registerMetaRoutes(server: FastifyInstance, engine: KpiEngine) {
  server.get('/v1/finance/kpis', async () => {
    return serializeRegistry(engine.registry);
  });

  server.get('/v1/finance/status', async (_request, reply) => {
    const status = engine.status();
    return reply.status(status.status === 'unhealthy' ? 503 : 200).send(serializeStatus(status));
  });
}
