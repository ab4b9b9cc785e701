/**
 * AI NARRATIVE CLIENT
 * ===================
 *
 * Sends a chart image plus the fixed analysis prompt to the configured
 * provider. Every failure (timeout, non-2xx, malformed or empty body) reaches
 * the caller as RemoteServiceError with the underlying message kept.
 */

import { z } from 'zod';
import { RemoteServiceError, ValidationError } from '../../common/errors.js';
import { toRemoteServiceError } from '../../common/http.js';
import type { Logger } from '../../common/logger.js';
import { CHART_ANALYSIS_PROMPT } from './narrative.prompt.js';
import {
  CHART_IMAGE_MIME_TYPES,
  type ChartImage,
  type ChartImageMime,
  type INarrativeProvider,
  type NarrativeResult,
} from './narrative.types.js';

const PROVIDER_LABEL: Record<INarrativeProvider['key'], string> = {
  openai: 'OpenAI',
  gemini: 'Gemini',
};

const Base64Body = z.string().base64();

export function isChartImageMime(value: string): value is ChartImageMime {
  return CHART_IMAGE_MIME_TYPES.some((mime) => mime === value);
}

/**
 * Accepts raw base64 or a data URL ("data:image/png;base64,....").
 */
export function decodeChartImage(encoded: string, mimeType: string): ChartImage {
  const match = /^data:([^;]+);base64,(.*)$/s.exec(encoded);
  const mime = match ? match[1] : mimeType;
  const body = match ? match[2] : encoded;

  if (!isChartImageMime(mime)) {
    throw new ValidationError(`Unsupported image type "${mime}", expected one of ${CHART_IMAGE_MIME_TYPES.join(', ')}`);
  }
  if (!Base64Body.safeParse(body).success) {
    throw new ValidationError('Chart image is not valid base64');
  }
  const bytes = Buffer.from(body, 'base64');
  if (bytes.length === 0) {
    throw new ValidationError('Chart image is empty');
  }
  return { bytes, mimeType: mime };
}

export class NarrativeClient {
  constructor(
    private readonly provider: INarrativeProvider,
    private readonly logger: Logger,
    private readonly prompt: string = CHART_ANALYSIS_PROMPT,
  ) {}

  get providerKey(): INarrativeProvider['key'] {
    return this.provider.key;
  }

  async recommend(image: ChartImage): Promise<NarrativeResult> {
    if (image.bytes.length === 0) {
      throw new ValidationError('Chart image is empty');
    }

    const label = PROVIDER_LABEL[this.provider.key];
    const startedAt = Date.now();

    let text: string;
    try {
      text = await this.provider.recommend(image, this.prompt);
    } catch (error) {
      const wrapped = toRemoteServiceError(label, error);
      this.logger.warn(
        { provider: this.provider.key, model: this.provider.model, durationMs: Date.now() - startedAt },
        wrapped.message,
      );
      throw wrapped;
    }

    const recommendation = text.trim();
    if (!recommendation) {
      throw new RemoteServiceError(label, 'empty recommendation text');
    }

    this.logger.info(
      {
        provider: this.provider.key,
        model: this.provider.model,
        durationMs: Date.now() - startedAt,
        chars: recommendation.length,
      },
      'narrative generated',
    );

    return { provider: this.provider.key, model: this.provider.model, recommendation };
  }
}
