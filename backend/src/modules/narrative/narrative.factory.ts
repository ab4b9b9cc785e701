import { createHttpClient } from '../../common/http.js';
import type { Env } from '../../config/env.js';
import type { INarrativeProvider } from './narrative.types.js';
import { GEMINI_BASE_URL, GeminiNarrativeProvider, OpenAiNarrativeProvider } from './providers/index.js';

type NarrativeEnv = Pick<
  Env,
  | 'NARRATIVE_PROVIDER'
  | 'NARRATIVE_TIMEOUT_MS'
  | 'OPENAI_API_KEY'
  | 'OPENAI_MODEL'
  | 'OPENAI_BASE_URL'
  | 'GEMINI_API_KEY'
  | 'GEMINI_MODEL'
>;

export function createNarrativeProvider(config: NarrativeEnv): INarrativeProvider {
  switch (config.NARRATIVE_PROVIDER) {
    case 'openai':
      return new OpenAiNarrativeProvider(
        createHttpClient({ baseURL: config.OPENAI_BASE_URL, timeoutMs: config.NARRATIVE_TIMEOUT_MS }),
        { apiKey: config.OPENAI_API_KEY, model: config.OPENAI_MODEL },
      );
    case 'gemini':
      return new GeminiNarrativeProvider(
        createHttpClient({ baseURL: GEMINI_BASE_URL, timeoutMs: config.NARRATIVE_TIMEOUT_MS }),
        { apiKey: config.GEMINI_API_KEY, model: config.GEMINI_MODEL },
      );
  }
}
