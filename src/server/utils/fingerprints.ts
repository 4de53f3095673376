/**
 * Fingerprint Utilities
 *
 * Deterministic identifiers for contextual RAG documents.
 */

import { createHash } from 'crypto';

/**
 * Generate the document ID of a RAG chunk:
 * md5("{first 100 chars of content}_{title}_{category}") as hex.
 *
 * Identical content under the same title and category always yields the same ID,
 * so reprocessing a source replaces rather than duplicates its documents.
 */
export function generateRagDocumentId(content: string, title: string, category: string): string {
  const hashInput = `${content.slice(0, 100)}_${title}_${category}`;
  return createHash('md5').update(hashInput, 'utf8').digest('hex');
}
