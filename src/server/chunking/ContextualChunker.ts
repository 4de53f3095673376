/**
 * ContextualChunker - Character-bounded chunks with overlap, cut at sentence ends
 */

import { clampInt } from '../utils/textUtils.js';

export interface ContextualChunkOptions {
  chunkSize: number; // characters
  chunkOverlap: number; // characters
  boundarySearchWindow: number; // characters before the tentative end searched for a sentence end
}

export const DEFAULT_CONTEXTUAL_CHUNK_OPTIONS: ContextualChunkOptions = {
  chunkSize: 800,
  chunkOverlap: 100,
  boundarySearchWindow: 200,
};

const SENTENCE_DELIMITERS = ['. ', '! ', '? ', '.\n', '!\n', '?\n'] as const;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Index just past the last sentence delimiter in text[from, to), or -1
 */
function findLastSentenceEnd(text: string, from: number, to: number): number {
  const window = text.slice(from, to);
  let best = -1;

  for (const delimiter of SENTENCE_DELIMITERS) {
    const index = window.lastIndexOf(delimiter);
    if (index !== -1) {
      best = Math.max(best, from + index + delimiter.length);
    }
  }

  return best;
}

/**
 * Split text into chunks of at most chunkSize characters (before trimming). Each chunk
 * ends on the last sentence end within the final boundarySearchWindow characters when
 * there is one, and the next chunk starts chunkOverlap characters before that end.
 */
export function chunkByCharacters(
  text: string,
  options: Partial<ContextualChunkOptions> = {}
): string[] {
  const merged = { ...DEFAULT_CONTEXTUAL_CHUNK_OPTIONS, ...options };
  const chunkSize = Math.max(1, Math.trunc(merged.chunkSize));
  const chunkOverlap = clampInt(merged.chunkOverlap, 0, chunkSize - 1);
  const searchWindow = Math.max(0, Math.trunc(merged.boundarySearchWindow));

  if (!text.trim()) return [];
  if (text.length <= chunkSize) return [text];

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const sentenceEnd = findLastSentenceEnd(text, Math.max(end - searchWindow, start), end);
      if (sentenceEnd > start) {
        end = sentenceEnd;
      } else if (end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
        // Hard cut: keep surrogate pairs together
        end -= 1;
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    if (end >= text.length) break;

    // Forward progress: never step back to (or before) the current start
    let next = end - chunkOverlap;
    if (next > start && next < end && isLowSurrogate(text.charCodeAt(next))) {
      next += 1;
    }
    start = next > start ? next : end;
  }

  return chunks;
}
