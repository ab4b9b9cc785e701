import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env as defaultEnv, type Env } from './config/env.js';
import { registerRoutes } from './api/routes.js';
import { AppError } from './common/errors.js';
import { createHttpClient } from './common/http.js';
import {
  YahooNewsProvider,
  YahooPriceProvider,
  type INewsProvider,
  type IPriceDataProvider,
} from './modules/market-data/index.js';
import { ForecastService, DEFAULT_FORECAST_CONFIG } from './modules/forecast/index.js';
import { AnalysisPipeline, SessionStore } from './modules/analysis/index.js';
import { NarrativeClient, createNarrativeProvider, type INarrativeProvider } from './modules/narrative/index.js';

// ═══════════════════════════════════════════════════════════════
// HOST DEPENDENCIES (overridable for tests)
// ═══════════════════════════════════════════════════════════════

export interface AppDeps {
  env: Env;
  prices: IPriceDataProvider;
  news: INewsProvider;
  narrativeProvider: INarrativeProvider;
  today: () => Date;
}

function defaultDeps(env: Env): AppDeps {
  return {
    env,
    prices: new YahooPriceProvider(
      createHttpClient({ baseURL: env.PRICE_PROVIDER_BASE_URL, timeoutMs: env.PROVIDER_TIMEOUT_MS }),
    ),
    news: new YahooNewsProvider(
      createHttpClient({ baseURL: env.NEWS_PROVIDER_BASE_URL, timeoutMs: env.PROVIDER_TIMEOUT_MS }),
    ),
    narrativeProvider: createNarrativeProvider(env),
    today: () => new Date(),
  };
}

/**
 * Build Fastify Application
 */
export function buildApp(overrides: Partial<AppDeps> = {}): FastifyInstance {
  const env = overrides.env ?? defaultEnv;
  const deps: AppDeps = { ...defaultDeps(env), ...overrides };

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
    bodyLimit: 10 * 1024 * 1024,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  const sessions = new SessionStore(env.SESSION_CAPACITY);
  const forecasts = new ForecastService({
    ...DEFAULT_FORECAST_CONFIG,
    model: env.FORECAST_MODEL,
    mode: env.FORECAST_MODE,
  });
  const pipeline = new AnalysisPipeline({
    prices: deps.prices,
    news: deps.news,
    forecasts,
    sessions,
    logger: app.log,
  });
  const narrative = new NarrativeClient(deps.narrativeProvider, app.log);

  app.register(async (fastify) => {
    await registerRoutes(fastify, { pipeline, sessions, narrative, today: deps.today });
  });

  return app;
}
