export { OpenAiNarrativeProvider, type OpenAiProviderConfig } from './openai.provider.js';
export { GeminiNarrativeProvider, GEMINI_BASE_URL, type GeminiProviderConfig } from './gemini.provider.js';
