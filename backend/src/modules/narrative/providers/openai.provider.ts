/**
 * OPENAI VISION PROVIDER
 * Chat Completions with the chart attached as a base64 data URL.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { RemoteServiceError } from '../../../common/errors.js';
import type { ChartImage, INarrativeProvider } from '../narrative.types.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAiProviderConfig {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export class OpenAiNarrativeProvider implements INarrativeProvider {
  readonly key = 'openai' as const;
  readonly model: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: OpenAiProviderConfig,
  ) {
    this.model = config.model;
  }

  async recommend(image: ChartImage, prompt: string): Promise<string> {
    if (!this.config.apiKey) {
      throw new RemoteServiceError('OpenAI', 'provider not configured: OPENAI_API_KEY is missing');
    }

    const response = await this.http.post(
      '/chat/completions',
      {
        model: this.model,
        max_tokens: this.config.maxTokens ?? 800,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              {
                type: 'image_url',
                image_url: { url: `data:${image.mimeType};base64,${image.bytes.toString('base64')}` },
              },
            ],
          },
        ],
      },
      { headers: { Authorization: `Bearer ${this.config.apiKey}` } },
    );

    const parsed = ChatCompletionSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new RemoteServiceError('OpenAI', 'malformed response: missing choices[0].message');
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}
