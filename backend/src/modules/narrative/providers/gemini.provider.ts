/**
 * GEMINI VISION PROVIDER
 * generateContent with the chart passed as inline_data.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { RemoteServiceError } from '../../../common/errors.js';
import type { ChartImage, INarrativeProvider } from '../narrative.types.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
      }),
    )
    .min(1),
});

export interface GeminiProviderConfig {
  apiKey: string;
  model: string;
}

export class GeminiNarrativeProvider implements INarrativeProvider {
  readonly key = 'gemini' as const;
  readonly model: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: GeminiProviderConfig,
  ) {
    this.model = config.model;
  }

  async recommend(image: ChartImage, prompt: string): Promise<string> {
    if (!this.config.apiKey) {
      throw new RemoteServiceError('Gemini', 'provider not configured: GEMINI_API_KEY is missing');
    }

    const response = await this.http.post(
      `/models/${encodeURIComponent(this.model)}:generateContent`,
      {
        contents: [
          {
            role: 'user',
            parts: [
              { text: prompt },
              { inline_data: { mime_type: image.mimeType, data: image.bytes.toString('base64') } },
            ],
          },
        ],
      },
      { headers: { 'x-goog-api-key': this.config.apiKey } },
    );

    const parsed = GenerateContentSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new RemoteServiceError('Gemini', 'malformed response: missing candidates[0].content');
    }
    return parsed.data.candidates[0].content.parts
      .map((part) => part.text ?? '')
      .join('');
  }
}
