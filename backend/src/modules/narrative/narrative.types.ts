/**
 * NARRATIVE TYPES
 * ===============
 *
 * A vision-capable chat model looks at a rendered chart and answers with a
 * buy / hold / sell opinion. Providers are interchangeable.
 */

export type NarrativeProviderKey = 'openai' | 'gemini';

export const CHART_IMAGE_MIME_TYPES = ['image/png', 'image/jpeg', 'image/webp'] as const;

export type ChartImageMime = (typeof CHART_IMAGE_MIME_TYPES)[number];

export interface ChartImage {
  bytes: Buffer;
  mimeType: ChartImageMime;
}

export interface INarrativeProvider {
  readonly key: NarrativeProviderKey;
  readonly model: string;
  /**
   * Resolves to the model's text. Any failure rejects; there is no fallback text.
   */
  recommend(image: ChartImage, prompt: string): Promise<string>;
}

export interface NarrativeResult {
  provider: NarrativeProviderKey;
  model: string;
  recommendation: string;
}
