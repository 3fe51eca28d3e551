import type { Translator } from '../types.js';
import { AnthropicTranslator } from './anthropic.js';
import { GeminiTranslator } from './gemini.js';
import { OpenAITranslator, createSeaLionTranslator } from './openai.js';

export const PROVIDER_NAMES = ['sea-lion', 'openai', 'anthropic', 'gemini'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface TranslatorSettings {
  provider: ProviderName;
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

export function createTranslator(settings: TranslatorSettings): Translator {
  const { provider, ...config } = settings;
  switch (provider) {
    case 'sea-lion':
      return createSeaLionTranslator(config);
    case 'openai':
      return new OpenAITranslator(config);
    case 'anthropic':
      return new AnthropicTranslator(config);
    case 'gemini':
      return new GeminiTranslator(config);
  }
}
