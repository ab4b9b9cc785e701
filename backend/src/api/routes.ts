import type { FastifyInstance } from 'fastify';
import { analysisRoutes, type AnalysisRouteDeps } from './analysis.routes.js';
import { narrativeRoutes } from './narrative.routes.js';
import type { NarrativeClient } from '../modules/narrative/index.js';

export interface RouteDeps extends AnalysisRouteDeps {
  narrative: NarrativeClient;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/api/health', async () => ({
    ok: true,
    narrativeProvider: deps.narrative.providerKey,
    timestamp: new Date().toISOString(),
  }));

  await analysisRoutes(app, deps);
  await narrativeRoutes(app, deps);
}
