/**
 * Sliding-Window Chunker
 *
 * Splits extracted text into fixed-size character windows that overlap by
 * a configured amount. Windows start every (chunkSize - overlap) characters
 * until the start passes the end of the text, and the last partial window
 * is kept, so a text of length L yields ceil(L / step) chunks.
 *
 * Default chunk target: 1000 chars, 200 char overlap.
 */

import { InvalidConfigurationError } from './errors';
import type { Chunk } from './types';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_OVERLAP = 200;

export function validateChunkOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(
      'chunkSize',
      `must be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(
      'overlap',
      `must be a non-negative integer, got ${overlap}`
    );
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      'overlap',
      `must be smaller than chunkSize (${overlap} >= ${chunkSize})`
    );
  }
}

/**
 * 1-based page containing a character offset. Returns undefined when the
 * document has no page information.
 */
export function pageAt(offset: number, pageOffsets: readonly number[]): number | undefined {
  if (pageOffsets.length === 0) return undefined;

  // Binary search for the last page start <= offset
  let lo = 0;
  let hi = pageOffsets.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (pageOffsets[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

export function chunkText(
  text: string,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_OVERLAP,
  sourceDocument = '',
  pageOffsets: readonly number[] = []
): Chunk[] {
  validateChunkOptions(chunkSize, overlap);
  if (text.length === 0) return [];

  const step = chunkSize - overlap;
  const chunks: Chunk[] = [];

  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(text.length, start + chunkSize);
    const chunk: Chunk = {
      text: text.slice(start, end),
      sourceDocument,
      position: chunks.length,
      charSpan: [start, end],
    };
    const page = pageAt(start, pageOffsets);
    if (page !== undefined) chunk.page = page;
    chunks.push(chunk);
  }

  return chunks;
}

/**
 * Rebuild the original text from its chunks by dropping the part of each
 * chunk already covered by the previous ones.
 */
export function joinChunks(chunks: readonly Chunk[]): string {
  let text = '';
  for (const chunk of chunks) {
    const [start] = chunk.charSpan;
    text += chunk.text.slice(Math.max(0, text.length - start));
  }
  return text;
}
