/**
 * API CONTRACTS
 * =============
 *
 * zod schemas for request bodies and params. A failed parse throws ZodError,
 * which the global error handler turns into 400 VALIDATION_ERROR.
 */

import { z } from 'zod';
import { MAX_LOOKBACK_YEARS, MIN_LOOKBACK_YEARS, isIsoDate } from '../modules/market-data/index.js';
import { DEFAULT_INDICATORS, INDICATOR_IDS } from '../modules/indicators/index.js';
import {
  FORECAST_MODES,
  MAX_FORECAST_DAYS,
  MIN_FORECAST_DAYS,
  REGRESSION_MODEL_KEYS,
} from '../modules/forecast/index.js';
import { CHART_IMAGE_MIME_TYPES } from '../modules/narrative/index.js';

const IsoDate = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' });

export const AnalysisBodySchema = z
  .object({
    symbols: z.union([z.string(), z.array(z.string())]).transform((v) => (Array.isArray(v) ? v.join(',') : v)),
    market: z.enum(['IN', 'US']).default('US'),
    years: z.number().int().min(MIN_LOOKBACK_YEARS).max(MAX_LOOKBACK_YEARS).default(2),
    start: IsoDate.optional(),
    end: IsoDate.optional(),
    forecastDays: z.number().int().min(MIN_FORECAST_DAYS).max(MAX_FORECAST_DAYS).default(30),
    indicators: z.array(z.enum(INDICATOR_IDS)).default([...DEFAULT_INDICATORS]),
    model: z.enum(REGRESSION_MODEL_KEYS).optional(),
    mode: z.enum(FORECAST_MODES).optional(),
    includeNews: z.boolean().default(true),
    sessionId: z.string().uuid().optional(),
  })
  .refine((b) => (b.start === undefined) === (b.end === undefined), {
    message: 'start and end must be given together',
    path: ['start'],
  })
  .refine((b) => b.start === undefined || b.end === undefined || b.start <= b.end, {
    message: 'start must not be after end',
    path: ['start'],
  });

export type AnalysisBody = z.infer<typeof AnalysisBodySchema>;

export const SessionParamsSchema = z.object({
  sessionId: z.string().uuid(),
});

export const ChartParamsSchema = SessionParamsSchema.extend({
  symbol: z.string().min(1),
});

export const NarrativeBodySchema = z.object({
  image: z.string().min(1),
  mimeType: z.enum(CHART_IMAGE_MIME_TYPES).default('image/png'),
});
