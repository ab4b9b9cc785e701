/**
 * ANALYSIS ROUTES
 *
 * Endpoints:
 * - GET    /api/indicators                          - indicator catalog
 * - POST   /api/analysis                            - run a batch
 * - GET    /api/analysis/:sessionId                 - stored batch report
 * - GET    /api/analysis/:sessionId/:symbol/chart   - chart traces
 * - DELETE /api/analysis/:sessionId                 - end a session
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { NotFoundError, ValidationError } from '../common/errors.js';
import {
  toBatchReport,
  type AnalysisPipeline,
  type AnalysisRequest,
  type SessionStore,
} from '../modules/analysis/index.js';
import { INDICATOR_CATALOG, INDICATOR_IDS, selectorLabel } from '../modules/indicators/index.js';
import { lookbackRange, resolveSymbols } from '../modules/market-data/index.js';
import { AnalysisBodySchema, ChartParamsSchema, SessionParamsSchema, type AnalysisBody } from './analysis.contracts.js';

export interface AnalysisRouteDeps {
  pipeline: AnalysisPipeline;
  sessions: SessionStore;
  today?: () => Date;
}

export function toAnalysisRequest(body: AnalysisBody, today: Date): AnalysisRequest {
  const symbols = resolveSymbols(body.symbols, body.market);
  if (symbols.length === 0) {
    throw new ValidationError('At least one stock symbol is required');
  }

  const range = body.start !== undefined && body.end !== undefined
    ? { start: body.start, end: body.end }
    : lookbackRange(body.years, today);

  return {
    symbols,
    market: body.market,
    range,
    indicators: body.indicators,
    forecast: {
      forecastDays: body.forecastDays,
      ...(body.model ? { model: body.model } : {}),
      ...(body.mode ? { mode: body.mode } : {}),
    },
    includeNews: body.includeNews,
  };
}

export async function analysisRoutes(app: FastifyInstance, deps: AnalysisRouteDeps): Promise<void> {
  const { pipeline, sessions } = deps;
  const today = deps.today ?? (() => new Date());

  app.get('/api/indicators', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      data: INDICATOR_IDS.map((id) => ({
        id,
        label: selectorLabel(INDICATOR_CATALOG[id]),
        selector: INDICATOR_CATALOG[id],
      })),
    });
  });

  app.post('/api/analysis', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = AnalysisBodySchema.parse(req.body);
    const request = toAnalysisRequest(body, today());
    const session = await pipeline.run(request, body.sessionId);

    return reply.send({ ok: true, data: toBatchReport(session) });
  });

  app.get('/api/analysis/:sessionId', async (req: FastifyRequest, reply: FastifyReply) => {
    const { sessionId } = SessionParamsSchema.parse(req.params);
    return reply.send({ ok: true, data: toBatchReport(sessions.get(sessionId)) });
  });

  app.get('/api/analysis/:sessionId/:symbol/chart', async (req: FastifyRequest, reply: FastifyReply) => {
    const { sessionId, symbol } = ChartParamsSchema.parse(req.params);
    const session = sessions.get(sessionId);
    const [resolved = symbol] = resolveSymbols(symbol, session.request.market);
    const result = session.result(resolved);

    if (!result) {
      throw new NotFoundError(`Symbol ${symbol} is not part of session ${sessionId}`);
    }
    if (result.status === 'skipped') {
      throw new NotFoundError(`No chart for ${result.symbol}: ${result.error.message}`);
    }

    return reply.send({ ok: true, data: result.chart });
  });

  app.delete('/api/analysis/:sessionId', async (req: FastifyRequest, reply: FastifyReply) => {
    const { sessionId } = SessionParamsSchema.parse(req.params);
    if (!sessions.delete(sessionId)) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }
    return reply.send({ ok: true, data: { sessionId, deleted: true } });
  });
}
