import { writeFile } from 'fs/promises';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import { ConfigurationError, UnsupportedLanguageError } from './types.js';
import { CACHE_BACKENDS, loadConfig } from './config.js';
import { buildTranslationApp, type TranslationApp } from './app.js';
import type { PipelineProgress } from './pipeline.js';
import { PROVIDER_NAMES } from './providers/index.js';
import { BookDownloader, DEFAULT_BOOK_URL } from './source/book-downloader.js';
import { assertSupportedLanguage, getLanguageName, LANGUAGE_CODES } from './languages.js';
import { logger } from './utils/logger.js';

export interface CliOptions {
  lang: string;
  output: string;
  url: string;
  provider?: string;
  maxChunkSize?: string;
  cache?: string;
  verbose?: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name('book-translate')
    .description('Translate a plain-text book chunk by chunk with caching, retries and rate limiting')
    .addOption(
      new Option('-l, --lang <code>', 'target language for translation').choices(LANGUAGE_CODES).default('id')
    )
    .option('-o, --output <path>', 'output file for the translated book', 'translated_book.txt')
    .option('-u, --url <url>', 'URL of the book to translate', DEFAULT_BOOK_URL)
    .addOption(new Option('-p, --provider <name>', 'translation backend').choices(PROVIDER_NAMES))
    .option('--max-chunk-size <chars>', 'maximum characters per translated chunk')
    .addOption(new Option('--cache <backend>', 'translation cache backend').choices(CACHE_BACKENDS))
    .option('-v, --verbose', 'enable debug logging')
    .action(async (options: CliOptions) => {
      await run(options);
    });
}

function printSummary(app: TranslationApp, output: string): void {
  const stats = app.pipeline.getStats();
  const api = app.caller.getApiStats();

  console.log(chalk.green(`\nTranslation completed! Output saved to ${output}`));
  console.log(`Translated ${stats.totalChunks} chunks (${stats.outputLength} characters)`);
  if (stats.failedChunks > 0) {
    console.log(chalk.yellow(`Chunks left untranslated: ${stats.failedChunks}`));
  }
  console.log(`Time taken: ${(stats.elapsedMs / 1000).toFixed(2)} seconds`);
  console.log(`API calls: ${stats.totalCalls} (Failed: ${stats.failedCalls}, cache hits: ${stats.cacheHits})`);
  console.log(`Success rate: ${api.successRate}%`);
  console.log(`Cache entries: ${stats.cacheEntries}`);
}

export async function run(options: CliOptions): Promise<void> {
  if (options.verbose) {
    logger.level = 'debug';
  }
  assertSupportedLanguage(options.lang);

  const config = loadConfig(process.env, {
    TRANSLATION_PROVIDER: options.provider,
    MAX_CHUNK_SIZE: options.maxChunkSize,
    CACHE_BACKEND: options.cache,
  });
  const app = buildTranslationApp(config);

  try {
    const downloader = new BookDownloader({ url: options.url, cacheFile: config.storage.bookCacheFile });
    const bookText = await downloader.download();
    console.log(chalk.dim(`Book loaded (${bookText.length} characters)`));

    const languageName = getLanguageName(options.lang);
    const bar = new cliProgress.SingleBar(
      {
        format: `Translating to ${languageName} [{bar}] {percentage}% | {value}/{total} chunks | failed: {failed}`,
      },
      cliProgress.Presets.shades_classic
    );
    app.pipeline.on('started', ({ totalChunks }: { totalChunks: number }) => {
      bar.start(totalChunks, 0, { failed: 0 });
    });
    app.pipeline.on('progress', (progress: PipelineProgress) => {
      bar.update(progress.completed, { failed: progress.failed });
    });

    let translated: string;
    try {
      translated = await app.pipeline.translateDocument(bookText, options.lang);
    } finally {
      bar.stop();
    }

    await writeFile(options.output, translated, 'utf8');
    printSummary(app, options.output);
  } finally {
    app.close();
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Translation failed: ${message}`));
    if (!(error instanceof ConfigurationError) && !(error instanceof UnsupportedLanguageError)) {
      console.error('For troubleshooting, check your internet connection and API key validity.');
    }
    process.exitCode = 1;
  }
}
