import { EventEmitter } from 'events';
import type { Chunk, PipelineStats, RemoteTranslateFn } from './types.js';
import { chunkText, joinChunks } from './chunker.js';
import { assertSupportedLanguage, getLanguageName, SUPPORTED_LANGUAGES, type LanguageRegistry } from './languages.js';
import type { ResilientCaller } from './resilient-caller.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export interface PipelineConfig {
  maxChunkSize: number;
  placeholder: string;
  languages: LanguageRegistry;
}

export interface ChunkEvent {
  chunk: Chunk;
  total: number;
}

export interface ChunkFailedEvent extends ChunkEvent {
  error: Error;
}

export interface PipelineProgress {
  completed: number;
  total: number;
  failed: number;
  progress: number; // percentage
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  maxChunkSize: 2000,
  placeholder: '[Translation failed]',
  languages: SUPPORTED_LANGUAGES,
};

function emptyStats(targetLanguage: string): PipelineStats {
  return {
    targetLanguage,
    totalChunks: 0,
    translatedChunks: 0,
    failedChunks: 0,
    cacheHits: 0,
    totalCalls: 0,
    failedCalls: 0,
    cacheEntries: 0,
    outputLength: 0,
    elapsedMs: 0,
  };
}

/**
 * Translates a whole document chunk by chunk, strictly in order. A chunk that
 * cannot be translated is replaced by the placeholder and the run continues.
 *
 * Events: `started`, `chunk:translated`, `chunk:cache-hit`, `chunk:failed`,
 * `progress`, `completed`.
 */
export class TranslationPipeline extends EventEmitter {
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private stats: PipelineStats = emptyStats('');

  constructor(
    private readonly caller: ResilientCaller,
    private readonly remoteFn: RemoteTranslateFn,
    config: Partial<PipelineConfig> = {},
    logger: Logger = rootLogger
  ) {
    super();
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.logger = logger.child({ component: 'TranslationPipeline' });
  }

  async translateDocument(text: string, targetLanguage: string): Promise<string> {
    assertSupportedLanguage(targetLanguage, this.config.languages);

    const startedAt = Date.now();
    const stats = emptyStats(targetLanguage);
    this.stats = stats;

    const chunks = chunkText(text, this.config.maxChunkSize);
    stats.totalChunks = chunks.length;

    const languageName = getLanguageName(targetLanguage, this.config.languages);
    this.logger.info(
      { targetLanguage, characters: text.length, chunks: chunks.length },
      `Starting translation to ${languageName}`
    );
    this.emit('started', { targetLanguage, totalChunks: chunks.length });

    const translated: string[] = [];
    for (const chunk of chunks) {
      const result = await this.caller.attempt(chunk.text, targetLanguage, this.remoteFn);
      stats.totalCalls += result.attempts;
      stats.failedCalls += result.failedAttempts;

      if (result.status === 'success') {
        translated.push(result.text);
        stats.translatedChunks++;
        if (result.source === 'cache') {
          stats.cacheHits++;
          this.emit('chunk:cache-hit', { chunk, total: chunks.length } satisfies ChunkEvent);
        }
        this.emit('chunk:translated', { chunk, total: chunks.length } satisfies ChunkEvent);
      } else {
        translated.push(this.config.placeholder);
        stats.failedChunks++;
        this.logger.error(
          { err: result.error, chunk: chunk.index, attempts: result.attempts },
          'Error translating chunk, continuing with remaining chunks'
        );
        this.emit('chunk:failed', {
          chunk,
          total: chunks.length,
          error: result.error,
        } satisfies ChunkFailedEvent);
      }

      const completed = chunk.index + 1;
      this.emit('progress', {
        completed,
        total: chunks.length,
        failed: stats.failedChunks,
        progress: (completed / chunks.length) * 100,
      } satisfies PipelineProgress);
    }

    const output = joinChunks(translated);
    stats.outputLength = output.length;
    stats.cacheEntries = this.caller.cacheSize;
    stats.elapsedMs = Date.now() - startedAt;

    this.logger.info({ ...stats }, 'Translation completed');
    this.emit('completed', { ...stats });
    return output;
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }
}
