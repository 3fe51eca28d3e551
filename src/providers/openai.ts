import OpenAI from 'openai';
import { MalformedResponseError, RateLimitError, TransportError } from '../types.js';
import { BaseTranslator, type BaseTranslatorConfig } from './base.js';

export interface OpenAIConfig extends Omit<BaseTranslatorConfig, 'model'> {
  model?: string;
  baseURL?: string;
  /** Reported in errors and logs, e.g. `sea-lion` for an OpenAI-compatible endpoint. */
  name?: string;
  temperature?: number;
  maxTokens?: number;
}

export const SEA_LION_BASE_URL = 'https://api.sea-lion.ai/v1';
export const SEA_LION_DEFAULT_MODEL = 'aisingapore/Gemma-SEA-LION-v4-27B-IT';

function parseRetryAfter(value: string | null | undefined): number {
  if (!value) {
    return 0;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
}

/**
 * Chat-completions translator. Also drives OpenAI-compatible endpoints such
 * as SEA-LION through `baseURL`.
 */
export class OpenAITranslator extends BaseTranslator {
  readonly name: string;
  readonly model: string;

  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: OpenAIConfig) {
    const model = config.model ?? 'gpt-4o-mini';
    super({ ...config, model });
    this.name = config.name ?? 'openai';
    this.model = model;
    this.temperature = config.temperature ?? 0.3;
    this.maxTokens = config.maxTokens ?? 4000;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  protected async executeTranslation(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const response = await this.requestCompletion(systemPrompt, userPrompt, signal);

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new MalformedResponseError(
        'Unexpected API response format: missing choices[0].message.content',
        this.name
      );
    }
    return content;
  }

  private async requestCompletion(systemPrompt: string, userPrompt: string, signal?: AbortSignal) {
    try {
      return await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          max_tokens: this.maxTokens,
          temperature: this.temperature,
        },
        { signal }
      );
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        if (error.status === 429) {
          throw new RateLimitError(this.name, parseRetryAfter(error.headers?.['retry-after']));
        }
        throw new TransportError(error.message, this.name, error.status);
      }
      throw error;
    }
  }
}

export function createSeaLionTranslator(config: Omit<OpenAIConfig, 'baseURL' | 'name'>): OpenAITranslator {
  return new OpenAITranslator({
    ...config,
    name: 'sea-lion',
    baseURL: SEA_LION_BASE_URL,
    model: config.model ?? SEA_LION_DEFAULT_MODEL,
    temperature: config.temperature ?? 0.1,
  });
}
