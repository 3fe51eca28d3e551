import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import { MalformedResponseError, TranslationError, TransportError } from '../types.js';
import { BaseTranslator, type BaseTranslatorConfig } from './base.js';

export interface GeminiConfig extends Omit<BaseTranslatorConfig, 'model'> {
  model?: string;
  temperature?: number;
}

export class GeminiTranslator extends BaseTranslator {
  readonly name = 'gemini';
  readonly model: string;

  private readonly client: GoogleGenerativeAI;
  private readonly temperature: number;

  constructor(config: GeminiConfig) {
    const model = config.model ?? 'gemini-1.5-flash';
    super({ ...config, model });
    this.model = model;
    this.temperature = config.temperature ?? 0.3;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  protected async executeTranslation(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      const model = this.client.getGenerativeModel(
        {
          model: this.model,
          systemInstruction: systemPrompt,
          generationConfig: { temperature: this.temperature },
        },
        { timeout: this.timeoutMs }
      );

      const result = await model.generateContent(userPrompt, { signal });
      if (!result.response.candidates?.length) {
        throw new MalformedResponseError('Unexpected API response format: no candidates', this.name);
      }
      return result.response.text();
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapError(error: unknown): unknown {
    if (error instanceof TranslationError) {
      return error;
    }
    if (error instanceof GoogleGenerativeAIResponseError) {
      return new MalformedResponseError(error.message, this.name);
    }
    if (error instanceof GoogleGenerativeAIFetchError) {
      return new TransportError(error.message, this.name, error.status);
    }
    if (error instanceof GoogleGenerativeAIRequestInputError) {
      return new TranslationError(error.message, this.name, undefined, false);
    }
    if (error instanceof GoogleGenerativeAIError) {
      return new TransportError(error.message, this.name);
    }
    return error;
  }
}
