import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { KpiEngine } from '../../core/engine.js';
import type { PeriodRequest } from '../../core/types.js';
import { InvalidRequestError, isEngineError } from '../../core/errors.js';
import { parsePeriodRequest } from '../../analysis/period-parser.js';
import { PROBLEM_CONTENT_TYPE, serializeKpiResult, serializeProblem } from '../serialization.js';

const querySchema = z.object({
  period: z.string().optional(),
  freq: z.string().optional(),
  ttm: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(v => v === 'true' || v === '1'),
  as_of: z.string().optional(),
});

interface CalcParams {
  ticker: string;
  metric: string;
}

export function registerCalcRoutes(server: FastifyInstance, engine: KpiEngine) {
  server.get<{ Params: CalcParams }>('/v1/finance/calc/:ticker/:metric', async (request, reply) => {
    const { ticker, metric } = request.params;

    const query = querySchema.safeParse(request.query);
    if (!query.success) {
      const issues = query.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      const problem = serializeProblem(new InvalidRequestError(`Invalid query: ${issues}`));
      return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
    }

    let periodRequest: PeriodRequest;
    try {
      periodRequest = parsePeriodRequest(query.data);
    } catch (err) {
      if (!isEngineError(err)) throw err;
      const problem = serializeProblem(err);
      return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
    }

    const outcome = await engine.compute(ticker, metric, periodRequest);
    if (!outcome.success) {
      const problem = serializeProblem(outcome.error);
      return reply.status(problem.status).type(PROBLEM_CONTENT_TYPE).send(problem);
    }

    return reply.send(serializeKpiResult(outcome.result));
  });
}
