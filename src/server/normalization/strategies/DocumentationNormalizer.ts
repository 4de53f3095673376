/**
 * DocumentationNormalizer - Long-form documentation without markup
 *
 * The section contents of a document are joined into one text, a heading tree is
 * recovered with the hierarchical parser, and the document becomes a Table of Contents
 * chunk followed by one chunk (or several parts) per parsed node.
 */

import type { Chunk, IntermediateDocument, ParsedHeadingNode } from '../../contracts/types.js';
import {
  HeadingHeuristics,
  parseHierarchicalSections,
  type HeadingHeuristicsConfig,
} from '../../chunking/HierarchicalSectionParser.js';
import { splitByWordCount } from '../../chunking/WordBoundedSplitter.js';
import { countWords } from '../../utils/textUtils.js';
import { formatChunk, partLabel } from '../ChunkFormatter.js';
import type { DocumentNormalizer } from './DocumentNormalizer.js';

export interface DocumentationNormalizerOptions {
  /** Nodes with more words are split at line boundaries */
  maxWords?: number;
  heuristics?: HeadingHeuristicsConfig;
}

const DEFAULT_TITLE = 'BBM Documentation';
const DEFAULT_SOURCE = 'bbm_docs';
const DEFAULT_CATEGORY = 'game_mods';
const SOURCE_TAG = 'documentation';

export class DocumentationNormalizer implements DocumentNormalizer {
  private readonly maxWords: number;
  private readonly heuristics: HeadingHeuristicsConfig;

  constructor(options: DocumentationNormalizerOptions = {}) {
    this.maxWords = options.maxWords ?? 400;
    this.heuristics = options.heuristics ?? HeadingHeuristics;
  }

  getName(): string {
    return 'documentation';
  }

  normalize(document: IntermediateDocument): Chunk[] {
    const title = document.title || DEFAULT_TITLE;
    const provenance = [document.source || DEFAULT_SOURCE, document.category || DEFAULT_CATEGORY, SOURCE_TAG];

    const fullText = document.sections.map(section => section.content.join('\n')).join('\n');
    if (!fullText.trim()) return [];

    const nodes = parseHierarchicalSections(fullText, this.heuristics);
    if (nodes.length === 0) return [];

    const chunks: Chunk[] = [formatChunk({
      title,
      section: 'Table of Contents',
      mainContent: this.tableOfContents(nodes),
      provenance,
    })];

    for (const node of nodes) {
      if (!node.content) continue;

      const parentSection = node.parent && node.parent !== node.title ? node.parent : undefined;
      const parts =
        countWords(node.content) > this.maxWords
          ? splitByWordCount(node.content.split('\n'), { maxWords: this.maxWords, separator: '\n' })
          : [node.content];

      parts.forEach((part, index) => {
        chunks.push(
          formatChunk({
            title,
            section: partLabel(node.title, index, parts.length),
            parentSection,
            mainContent: [part],
            provenance,
          })
        );
      });
    }

    return chunks;
  }

  /**
   * Level-1 titles as bullets, each followed by the level-2 titles filed under it
   */
  private tableOfContents(nodes: readonly ParsedHeadingNode[]): string[] {
    const lines = ['This document covers the following topics:'];
    let currentParent: string | undefined;

    for (const node of nodes) {
      if (node.level === 1) {
        lines.push(`\n• ${node.title}`);
        currentParent = node.title;
      } else if (node.level === 2 && currentParent !== undefined && node.parent === currentParent) {
        lines.push(`  - ${node.title}`);
      }
    }

    return lines;
  }
}
