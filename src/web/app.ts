import Fastify, { type FastifyInstance } from 'fastify';
import type { KpiEngine } from '../core/engine.js';
import { createChildLogger } from '../core/logger.js';
import { registerCalcRoutes } from './routes/calc.js';
import { registerMetaRoutes } from './routes/meta.js';
import { internalProblem, PROBLEM_CONTENT_TYPE } from './serialization.js';

const log = createChildLogger('web');

/**
 * Builds the HTTP API around an engine. Kept apart from server.ts so
 * tests can drive it with inject() and no open port.
 */
export function buildServer(engine: KpiEngine): FastifyInstance {
  const server = Fastify({ logger: false });

  registerCalcRoutes(server, engine);
  registerMetaRoutes(server, engine);

  server.addHook('onResponse', async (request, reply) => {
    log.info({ method: request.method, url: request.url, status: reply.statusCode, ms: Math.round(reply.elapsedTime) }, 'request');
  });

  // Global error handler: anything that is not an engine error is a 500
  server.setErrorHandler((error: Error, request, reply) => {
    log.error({ err: error, url: request.url }, 'unhandled error');
    const problem = internalProblem();
    reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
  });

  server.setNotFoundHandler((request, reply) => {
    reply.status(404).type(PROBLEM_CONTENT_TYPE).send({
      type: 'NotFound',
      title: 'Route not found',
      detail: `${request.method} ${request.url} is not a route`,
      status: 404,
    });
  });

  return server;
}
