/**
 * UnifiedNormalizationService - Category normalizer registry
 *
 * Maps each content category to its normalizer and runs documents through it. All
 * wiki categories share the PolicyNormalizer with their own rule table; documentation
 * and transcripts have dedicated normalizers.
 */

import type { Chunk } from '../contracts/types.js';
import { DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from '../config/chunkingConfig.js';
import { BadRequestError, UnknownCategoryError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { parseIntermediateDocument } from '../validation/intermediateDocumentSchemas.js';
import type { NormalizationPolicy } from './policies/NormalizationPolicy.js';
import { buildingsPolicy } from './policies/buildingsPolicy.js';
import { civilizationsPolicy } from './policies/civilizationsPolicy.js';
import { districtsPolicy } from './policies/districtsPolicy.js';
import { gameConceptsPolicy } from './policies/gameConceptsPolicy.js';
import { leadersPolicy } from './policies/leadersPolicy.js';
import {
  cityStatesPolicy,
  miscellaneousPolicy,
  naturalWondersPolicy,
  religionsPolicy,
  worldCongressPolicy,
} from './policies/modWikiPolicies.js';
import { wondersPolicy } from './policies/wondersPolicy.js';
import { DocumentationNormalizer } from './strategies/DocumentationNormalizer.js';
import type { DocumentNormalizer } from './strategies/DocumentNormalizer.js';
import { PolicyNormalizer } from './strategies/PolicyNormalizer.js';
import { TranscriptNormalizer } from './strategies/TranscriptNormalizer.js';

const WIKI_POLICIES: readonly NormalizationPolicy[] = [
  civilizationsPolicy,
  leadersPolicy,
  districtsPolicy,
  buildingsPolicy,
  wondersPolicy,
  gameConceptsPolicy,
  cityStatesPolicy,
  religionsPolicy,
  worldCongressPolicy,
  miscellaneousPolicy,
  naturalWondersPolicy,
];

export class UnifiedNormalizationService {
  private normalizers: Map<string, DocumentNormalizer> = new Map();

  constructor(config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG) {
    // Register normalizers
    for (const policy of WIKI_POLICIES) {
      this.normalizers.set(policy.name, new PolicyNormalizer(policy, { factThreshold: config.factThreshold }));
    }
    this.normalizers.set(
      'documentation',
      new DocumentationNormalizer({ maxWords: config.documentation.maxWords })
    );
    this.normalizers.set(
      'video_transcripts',
      new TranscriptNormalizer({
        targetWords: config.transcript.targetWords,
        overlapSentences: config.transcript.overlapSentences,
        fallbackOverlapWords: config.transcript.fallbackOverlapWords,
        minWords: config.transcript.minWords,
      })
    );
  }

  /**
   * Normalize documents of one category, concatenating their chunks in document order.
   * Raw documents are validated first, so missing optional fields take their defaults.
   *
   * @throws UnknownCategoryError when no normalizer is registered for the category
   * @throws InvalidDocumentError when an item cannot be read as a document
   */
  normalizeDocuments(category: string, documents: readonly unknown[]): Chunk[] {
    const normalizer = this.getNormalizer(category);
    const chunks: Chunk[] = [];

    for (const raw of documents) {
      const document = parseIntermediateDocument(raw);
      const documentChunks = normalizer.normalize(document);
      chunks.push(...documentChunks);

      logger.debug(
        {
          category,
          normalizer: normalizer.getName(),
          title: document.title,
          chunkCount: documentChunks.length,
        },
        'Normalized document'
      );
    }

    return chunks;
  }

  getNormalizer(category: string): DocumentNormalizer {
    const normalizer = this.normalizers.get(category);
    if (!normalizer) {
      throw new UnknownCategoryError(category, this.listCategories());
    }
    return normalizer;
  }

  /**
   * Register a custom normalizer, replacing any normalizer of the same category
   *
   * @param category - Category key
   * @param normalizer - Normalizer implementation
   */
  registerNormalizer(category: string, normalizer: DocumentNormalizer): void {
    if (!category.trim()) {
      throw new BadRequestError('Normalizer category must not be empty', { normalizerName: normalizer.getName() });
    }
    this.normalizers.set(category, normalizer);
    logger.debug({ category, normalizerName: normalizer.getName() }, 'Registered normalizer');
  }

  listCategories(): string[] {
    return [...this.normalizers.keys()];
  }
}
