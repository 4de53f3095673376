/**
 * WordBoundedSplitter - Groups consecutive content items into word-bounded parts
 *
 * Items are never cut: an item longer than maxWords becomes a part of its own.
 */

import { countWords } from '../utils/textUtils.js';

export interface WordBoundedSplitOptions {
  maxWords: number;
  /** Separator used to join the items of one part (default: single space) */
  separator?: string;
}

/**
 * Split items into groups whose word total stays within maxWords where possible.
 * Concatenating the groups yields the input items, in order.
 */
export function groupItemsByWordCount(items: readonly string[], maxWords: number): string[][] {
  const groups: string[][] = [];
  let current: string[] = [];
  let currentWordCount = 0;

  for (const item of items) {
    const wordCount = countWords(item);

    if (currentWordCount + wordCount > maxWords && current.length > 0) {
      groups.push(current);
      current = [];
      currentWordCount = 0;
    }

    current.push(item);
    currentWordCount += wordCount;
  }

  if (current.length > 0) {
    groups.push(current);
  }

  return groups;
}

/**
 * Split items into joined chunk strings of at most maxWords words (see groupItemsByWordCount)
 */
export function splitByWordCount(items: readonly string[], options: WordBoundedSplitOptions): string[] {
  const separator = options.separator ?? ' ';
  return groupItemsByWordCount(items, options.maxWords).map(group => group.join(separator));
}
