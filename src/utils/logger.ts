import pino from 'pino';

export type { Logger } from 'pino';

// stderr keeps stdout free for the translated output and the progress bar.
export const logger = pino(
  {
    name: 'book-translate',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2)
);
