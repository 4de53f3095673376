/**
 * DocumentNormalizer - Interface for category normalizers
 *
 * Each normalizer turns the intermediate documents of one content category into
 * formatted chunk strings. Normalizers are pure: the same document always yields the
 * same chunks, and documents are independent of each other.
 */

import type { Chunk, IntermediateDocument } from '../../contracts/types.js';

export interface DocumentNormalizer {
  /**
   * Get normalizer name
   */
  getName(): string;

  /**
   * Normalize one document into chunks, in section order.
   * A document without usable sections yields an empty list.
   */
  normalize(document: IntermediateDocument): Chunk[];
}
