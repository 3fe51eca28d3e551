import type { Chunk } from './types.js';

export const PARAGRAPH_SEPARATOR = '\n\n';

// Capturing group keeps the original whitespace between sentences at odd indices.
const SENTENCE_BOUNDARY = /(?<=[.!?])(\s+)/;

/**
 * Collapse whitespace without touching any other character. Applying it twice
 * gives the same result as applying it once.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, PARAGRAPH_SEPARATOR)
    .trim();
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_SEPARATOR)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export function splitSentences(paragraph: string): string[] {
  return paragraph
    .split(SENTENCE_BOUNDARY)
    .filter((_, i) => i % 2 === 0)
    .filter((sentence) => sentence.length > 0);
}

/**
 * Greedily pack the sentences of one oversized paragraph. A sentence longer
 * than `maxChunkSize` becomes a chunk of its own.
 */
function packSentences(paragraph: string, maxChunkSize: number): string[] {
  const pieces = paragraph.split(SENTENCE_BOUNDARY);
  const packed: string[] = [];
  let current = '';

  for (let i = 0; i < pieces.length; i += 2) {
    const sentence = pieces[i];
    if (sentence.length === 0) {
      continue;
    }
    const separator = i > 0 ? pieces[i - 1] : '';

    if (current.length === 0) {
      current = sentence;
    } else if (current.length + separator.length + sentence.length <= maxChunkSize) {
      current += separator + sentence;
    } else {
      packed.push(current);
      current = sentence;
    }
  }

  if (current.length > 0) {
    packed.push(current);
  }
  return packed;
}

/**
 * Split a document into ordered chunks of at most `maxChunkSize` characters,
 * packing whole paragraphs first and falling back to sentences for paragraphs
 * that do not fit on their own.
 */
export function chunkText(text: string, maxChunkSize: number): Chunk[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }

  const texts: string[] = [];
  let current = '';

  for (const paragraph of splitParagraphs(normalizeWhitespace(text))) {
    if (paragraph.length > maxChunkSize) {
      if (current.length > 0) {
        texts.push(current);
      }
      // The last sentence group stays open so the next paragraph can join it.
      const packed = packSentences(paragraph, maxChunkSize);
      texts.push(...packed.slice(0, -1));
      current = packed[packed.length - 1] ?? '';
      continue;
    }

    if (current.length === 0) {
      current = paragraph;
    } else if (current.length + PARAGRAPH_SEPARATOR.length + paragraph.length <= maxChunkSize) {
      current += PARAGRAPH_SEPARATOR + paragraph;
    } else {
      texts.push(current);
      current = paragraph;
    }
  }

  if (current.length > 0) {
    texts.push(current);
  }

  return texts.map((value, index) => Object.freeze({ index, text: value, length: value.length }));
}

export function joinChunks(texts: readonly string[]): string {
  return texts.join(PARAGRAPH_SEPARATOR);
}
