/**
 * SentenceChunker - Overlapping, sentence-aligned chunks for long transcripts
 *
 * Consecutive chunks repeat the last `overlapSentences` sentences of the previous chunk.
 * Text without detectable sentence boundaries (auto-generated captions often have no
 * punctuation) falls back to fixed word windows.
 */

import { clampInt, countWords, splitWords } from '../utils/textUtils.js';

export interface SentenceChunkOptions {
  targetWords: number;
  overlapSentences: number;
  /** Overlap of the word-window fallback, in words */
  fallbackOverlapWords: number;
}

export const DEFAULT_SENTENCE_CHUNK_OPTIONS: SentenceChunkOptions = {
  targetWords: 250,
  overlapSentences: 2,
  fallbackOverlapWords: 50,
};

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z])/;

/**
 * Split at ". ", "! " or "? " followed by an upper-case letter
 */
export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY);
}

/**
 * Remove transcript artifacts: immediately repeated words ("the the") and irregular whitespace
 */
export function cleanTranscript(text: string): string {
  return text
    .replace(/(?<![\p{L}\p{N}_])([\p{L}\p{N}_]+)(?: \1(?![\p{L}\p{N}_]))+/gu, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Fixed windows of `targetWords` words, each starting `targetWords - overlapWords`
 * words after the previous one. Stops at the first window that reaches the last word.
 */
export function chunkByWords(text: string, targetWords: number, overlapWords: number): string[] {
  const words = splitWords(text);
  const windowSize = Math.max(1, Math.trunc(targetWords));
  const step = windowSize - clampInt(overlapWords, 0, windowSize - 1);
  const chunks: string[] = [];

  for (let start = 0; start < words.length; start += step) {
    const end = start + windowSize;
    chunks.push(words.slice(start, end).join(' '));
    if (end >= words.length) break;
  }

  return chunks;
}

/**
 * Chunk text at sentence boundaries with sentence overlap between chunks.
 * Sentences are never truncated; a single sentence longer than targetWords becomes
 * (part of) a chunk on its own.
 */
export function chunkBySentences(
  text: string,
  options: Partial<SentenceChunkOptions> = {}
): string[] {
  const { targetWords, overlapSentences, fallbackOverlapWords } = {
    ...DEFAULT_SENTENCE_CHUNK_OPTIONS,
    ...options,
  };

  if (!text.trim()) return [];

  const sentences = splitSentences(text);
  if (sentences.length === 1) {
    return chunkByWords(text, targetWords, fallbackOverlapWords);
  }

  const overlap = Math.max(0, Math.trunc(overlapSentences));
  const chunks: string[] = [];
  let current: string[] = [];
  let currentWordCount = 0;
  // Sentences in `current` that no emitted chunk contains yet
  let freshSentences = 0;

  for (const rawSentence of sentences) {
    const sentence = rawSentence.trim();
    if (!sentence) continue;

    const sentenceWords = countWords(sentence);

    if (currentWordCount + sentenceWords > targetWords && freshSentences > 0) {
      chunks.push(current.join(' '));

      if (overlap > 0 && current.length >= overlap) {
        current = current.slice(-overlap);
        currentWordCount = current.reduce((total, s) => total + countWords(s), 0);
      } else {
        current = [];
        currentWordCount = 0;
      }
      freshSentences = 0;
    }

    current.push(sentence);
    currentWordCount += sentenceWords;
    freshSentences++;
  }

  if (freshSentences > 0) {
    chunks.push(current.join(' '));
  }

  return chunks;
}
