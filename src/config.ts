import { z } from 'zod';
import { ConfigurationError } from './types.js';
import { PROVIDER_NAMES, type ProviderName } from './providers/index.js';

export const CACHE_BACKENDS = ['json', 'sqlite', 'memory'] as const;

export type CacheBackend = (typeof CACHE_BACKENDS)[number];

export interface AppConfig {
  provider: {
    name: ProviderName;
    apiKey: string;
    model?: string;
  };

  translation: {
    maxChunkSize: number;
    placeholder: string;
  };

  resilience: {
    maxAttempts: number;
    retryBaseDelayMs: number;
    requestsPerMinute: number;
    requestTimeoutMs: number;
  };

  storage: {
    cacheBackend: CacheBackend;
    cacheFile: string;
    bookCacheFile: string;
  };
}

type ApiKeyVariable = 'SEA_LION_API_KEY' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY' | 'GEMINI_API_KEY';

const API_KEY_VARIABLES: Record<ProviderName, ApiKeyVariable> = {
  'sea-lion': 'SEA_LION_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TRANSLATION_PROVIDER: z.enum(PROVIDER_NAMES).default('sea-lion'),
  TRANSLATION_MODEL: z.string().min(1).optional(),
  SEA_LION_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  MAX_CHUNK_SIZE: positiveInt(2000),
  MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  REQUESTS_PER_MINUTE: positiveInt(10),
  REQUEST_TIMEOUT_MS: positiveInt(60000),
  FAILED_CHUNK_PLACEHOLDER: z.string().default('[Translation failed]'),
  CACHE_BACKEND: z.enum(CACHE_BACKENDS).default('json'),
  CACHE_FILE: z.string().min(1).default('translation_cache.json'),
  BOOK_CACHE_FILE: z.string().min(1).default('cached_book.txt'),
});

export type EnvOverrides = Partial<Record<keyof z.input<typeof envSchema>, string>>;

/**
 * Build the application config from environment variables. `overrides` take
 * precedence, which is how CLI flags are applied.
 *
 * @throws {ConfigurationError} on invalid values or a missing API key
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EnvOverrides = {}
): AppConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = envSchema.safeParse({ ...env, ...defined });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'env';
    throw new ConfigurationError(`Invalid configuration for ${field}: ${issue?.message}`, field);
  }

  const values = parsed.data;
  const keyVariable = API_KEY_VARIABLES[values.TRANSLATION_PROVIDER];
  const apiKey = values[keyVariable];
  if (typeof apiKey !== 'string' || apiKey.trim() === '') {
    throw new ConfigurationError(
      `${keyVariable} not found in environment variables. Add it to your .env file: ${keyVariable}=your_api_key_here`,
      keyVariable
    );
  }

  return {
    provider: {
      name: values.TRANSLATION_PROVIDER,
      apiKey,
      model: values.TRANSLATION_MODEL,
    },
    translation: {
      maxChunkSize: values.MAX_CHUNK_SIZE,
      placeholder: values.FAILED_CHUNK_PLACEHOLDER,
    },
    resilience: {
      maxAttempts: values.MAX_ATTEMPTS,
      retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
      requestsPerMinute: values.REQUESTS_PER_MINUTE,
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    },
    storage: {
      cacheBackend: values.CACHE_BACKEND,
      cacheFile: values.CACHE_FILE,
      bookCacheFile: values.BOOK_CACHE_FILE,
    },
  };
}
