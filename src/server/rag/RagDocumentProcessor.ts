/**
 * RagDocumentProcessor - Contextual documents for a vector store
 *
 * Alternative to the labeled chunk layout: each wiki section is prefixed with its page
 * title (and heading), cut into overlapping character-bounded chunks, and emitted with
 * a structured metadata object and a content-derived document ID.
 */

import type { IntermediateDocument, SourcePayload } from '../contracts/types.js';
import {
  DEFAULT_CONTEXTUAL_CHUNK_OPTIONS,
  chunkByCharacters,
  type ContextualChunkOptions,
} from '../chunking/ContextualChunker.js';
import { INTRODUCTION_HEADING } from '../normalization/policies/NormalizationPolicy.js';
import { generateRagDocumentId } from '../utils/fingerprints.js';
import { logger } from '../utils/logger.js';

export type RagMetadataValue = string | number;

export interface RagDocument {
  content: string;
  metadata: Record<string, RagMetadataValue>;
  docId: string;
}

export interface RagStatistics {
  totalDocuments: number;
  categories: Record<string, number>;
  avgContentLength: number;
  sources: string[];
}

export type Expansion = 'rise_and_fall' | 'gathering_storm' | 'base_game';

const DEFAULT_SOURCE = 'civ6_wiki';

/**
 * Sections whose joined text is shorter than this are skipped
 */
export const MIN_SECTION_LENGTH = 100;

/**
 * Expansion a section refers to, by plain substring match (so "GS" inside any word counts)
 */
export function detectExpansion(text: string): Expansion {
  if (text.includes('Rise and Fall') || text.includes('R&F')) return 'rise_and_fall';
  if (text.includes('Gathering Storm') || text.includes('GS')) return 'gathering_storm';
  return 'base_game';
}

function metadataString(metadata: Record<string, RagMetadataValue>, key: string): string {
  const value = metadata[key];
  return value === undefined ? '' : String(value);
}

export class RagDocumentProcessor {
  private readonly chunkOptions: ContextualChunkOptions;

  constructor(options: Partial<ContextualChunkOptions> = {}) {
    this.chunkOptions = { ...DEFAULT_CONTEXTUAL_CHUNK_OPTIONS, ...options };
  }

  /**
   * Convert one page into RAG documents, section by section
   */
  processPageData(page: IntermediateDocument): RagDocument[] {
    const documents: RagDocument[] = [];
    const source = page.source || DEFAULT_SOURCE;

    for (const section of page.sections) {
      const sectionText = section.content.join(' ');
      if (sectionText.length < MIN_SECTION_LENGTH) continue;

      let contextualized = page.title;
      if (section.heading && section.heading !== INTRODUCTION_HEADING) {
        contextualized += ` - ${section.heading}`;
      }
      contextualized += `\n\n${sectionText}`;

      const chunks = chunkByCharacters(contextualized, this.chunkOptions);
      const expansion = detectExpansion(sectionText);

      chunks.forEach((chunk, index) => {
        // Page-level metadata may override the base fields; the expansion tag always wins
        const metadata: Record<string, RagMetadataValue> = {
          source,
          category: page.category,
          title: page.title,
          section: section.heading,
          url: page.url,
          chunkIndex: index,
          totalChunks: chunks.length,
          ...page.metadata,
          expansion,
        };

        documents.push({
          content: chunk,
          metadata,
          docId: generateRagDocumentId(
            chunk,
            metadataString(metadata, 'title'),
            metadataString(metadata, 'category')
          ),
        });
      });
    }

    return documents;
  }

  /**
   * Process every category of a payload, in key order
   */
  processAll(payload: SourcePayload): RagDocument[] {
    const allDocuments: RagDocument[] = [];

    for (const [category, pages] of Object.entries(payload)) {
      const before = allDocuments.length;
      for (const page of pages) {
        allDocuments.push(...this.processPageData(page));
      }

      logger.info(
        { category, pageCount: pages.length, documentCount: allDocuments.length - before },
        'Processed category into RAG documents'
      );
    }

    return allDocuments;
  }

  getStatistics(documents: readonly RagDocument[]): RagStatistics {
    const categories: Record<string, number> = {};
    const sources = new Set<string>();
    let totalLength = 0;

    for (const document of documents) {
      const category = metadataString(document.metadata, 'category') || 'unknown';
      categories[category] = (categories[category] ?? 0) + 1;
      sources.add(metadataString(document.metadata, 'source') || 'unknown');
      totalLength += document.content.length;
    }

    return {
      totalDocuments: documents.length,
      categories,
      avgContentLength: documents.length > 0 ? totalLength / documents.length : 0,
      sources: [...sources],
    };
  }
}
