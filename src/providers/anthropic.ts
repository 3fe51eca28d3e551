import Anthropic from '@anthropic-ai/sdk';
import { MalformedResponseError, TransportError } from '../types.js';
import { BaseTranslator, type BaseTranslatorConfig } from './base.js';

export interface AnthropicConfig extends Omit<BaseTranslatorConfig, 'model'> {
  model?: string;
  maxTokens?: number;
}

export class AnthropicTranslator extends BaseTranslator {
  readonly name = 'anthropic';
  readonly model: string;

  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(config: AnthropicConfig) {
    const model = config.model ?? 'claude-3-5-haiku-20241022';
    super({ ...config, model });
    this.model = model;
    this.maxTokens = config.maxTokens ?? 4096;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: this.timeoutMs, maxRetries: 0 });
  }

  protected async executeTranslation(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const response = await this.requestMessage(systemPrompt, userPrompt, signal);

    const textBlock = response.content?.find((block) => block.type === 'text');
    if (textBlock?.type !== 'text') {
      throw new MalformedResponseError('Unexpected API response format: no text content block', this.name);
    }
    return textBlock.text;
  }

  private async requestMessage(systemPrompt: string, userPrompt: string, signal?: AbortSignal) {
    try {
      return await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: systemPrompt,
          messages: [{ role: 'user', content: userPrompt }],
        },
        { signal }
      );
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new TransportError(error.message, this.name, error.status);
      }
      throw error;
    }
  }
}
