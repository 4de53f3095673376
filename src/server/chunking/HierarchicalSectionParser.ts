/**
 * HierarchicalSectionParser - Recovers a heading tree from flat documentation text
 *
 * The input has no markup, so headings are guessed line by line. The guess is a
 * precision/recall trade-off: a short capitalised sentence without a full stop will be
 * taken for a heading, and an all-lower-case heading will be read as body text. Tune
 * HeadingHeuristics rather than adding special cases.
 */

import type { ParsedHeadingNode } from '../contracts/types.js';
import { isUpperCase, splitWords } from '../utils/textUtils.js';

export interface HeadingHeuristicsConfig {
  /** Prefix that marks a top-level step heading ("Step 3 - Terrain") */
  stepPrefix: string;
  /** Numbered sub-step heading ("Step 1.2 ...") */
  subStepPattern: RegExp;
  /** Candidate subheadings must be strictly shorter than this many characters */
  maxHeadingLength: number;
  /** ...and have at most this many words */
  maxHeadingWords: number;
  /** ...and contain none of these characters */
  forbiddenCharacters: readonly string[];
  /** Lines ending in one of these are continuation text, never headings */
  continuationEndings: readonly string[];
}

export const HeadingHeuristics: HeadingHeuristicsConfig = {
  stepPrefix: 'Step ',
  subStepPattern: /^Step \d+\.\d+/,
  maxHeadingLength: 80,
  maxHeadingWords: 8,
  forbiddenCharacters: [',', '(', ')'],
  continuationEndings: ['.', ','],
};

/**
 * Heading level of a trimmed line, or null for body text
 */
export function classifyHeading(
  line: string,
  heuristics: HeadingHeuristicsConfig = HeadingHeuristics
): number | null {
  if (!line) return null;
  if (heuristics.continuationEndings.some(ending => line.endsWith(ending))) return null;

  // Numbered sub-steps also start with the step prefix, so they are tested first
  if (heuristics.subStepPattern.test(line)) return 2;
  if (isUpperCase(line) || line.startsWith(heuristics.stepPrefix)) return 1;

  if (
    line.length < heuristics.maxHeadingLength &&
    !heuristics.forbiddenCharacters.some(char => line.includes(char)) &&
    splitWords(line).length <= heuristics.maxHeadingWords &&
    /^\p{Lu}/u.test(line)
  ) {
    return 2;
  }

  return null;
}

interface OpenSection {
  title: string;
  level: number;
  parent?: string;
}

/**
 * Parse newline-separated text into heading nodes, in document order.
 *
 * Nodes without body text are not emitted. Body lines seen before the first heading
 * are kept and attributed to that first heading.
 */
export function parseHierarchicalSections(
  text: string,
  heuristics: HeadingHeuristicsConfig = HeadingHeuristics
): ParsedHeadingNode[] {
  const nodes: ParsedHeadingNode[] = [];
  let current: OpenSection | null = null;
  let currentContent: string[] = [];
  let topLevelTitle: string | undefined;

  const flush = (): void => {
    if (current && currentContent.length > 0) {
      const node: ParsedHeadingNode = {
        title: current.title,
        level: current.level,
        content: currentContent.join('\n').trim(),
      };
      if (current.parent !== undefined) {
        node.parent = current.parent;
      }
      nodes.push(node);
    }
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    const level = classifyHeading(line, heuristics);

    if (level === null) {
      if (line) currentContent.push(line);
      continue;
    }

    if (current) {
      flush();
      currentContent = [];
    }

    if (level === 1 || topLevelTitle === undefined) {
      topLevelTitle = line;
    }

    current = {
      title: line,
      level,
      parent: level > 1 && topLevelTitle !== line ? topLevelTitle : undefined,
    };
  }

  flush();
  return nodes;
}
