import type { ProviderConfig, Translator } from '../types.js';
import { DEFAULT_SOURCE_LANGUAGE, getLanguageName } from '../languages.js';
import { getTranslationSystemPrompt, getTranslationUserPrompt } from '../prompts.js';

export interface BaseTranslatorConfig extends ProviderConfig {
  sourceLanguage?: string;
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 60000;

export abstract class BaseTranslator implements Translator {
  abstract readonly name: string;
  abstract readonly model: string;

  protected readonly sourceLanguage: string;
  protected readonly timeoutMs: number;

  constructor(config: BaseTranslatorConfig) {
    this.sourceLanguage = config.sourceLanguage ?? DEFAULT_SOURCE_LANGUAGE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  /**
   * Send one prompt pair to the backend.
   *
   * @throws {TransportError} on network failures and non-2xx responses
   * @throws {MalformedResponseError} when the response has no translated text
   */
  protected abstract executeTranslation(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string>;

  translate = async (text: string, targetLanguage: string, signal?: AbortSignal): Promise<string> => {
    const systemPrompt = getTranslationSystemPrompt();
    const userPrompt = getTranslationUserPrompt(
      text,
      this.sourceLanguage,
      getLanguageName(targetLanguage)
    );

    const translated = await this.executeTranslation(systemPrompt, userPrompt, signal);
    return translated.trim();
  };
}
