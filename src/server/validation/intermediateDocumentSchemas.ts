/**
 * Intermediate Document Schemas (Zod)
 *
 * Runtime validation of scraper output. Scrapers are loose about optional fields, so
 * missing fields default instead of failing; only input that cannot be read as a
 * document at all (not an object, sections that are not a list of objects, ...) is
 * rejected with InvalidDocumentError.
 */

import { z } from 'zod';
import type { IntermediateDocument, SourcePayload } from '../contracts/types.js';
import { InvalidDocumentError, NotFoundError } from '../types/errors.js';

/**
 * Key under which a bare document or document list is filed by parseSourcePayload
 */
export const DEFAULT_PAYLOAD_KEY = 'documents';

/**
 * String field that may be missing, null, or a scalar written without quotes
 */
const lenientStringSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

function stringifyMetadataValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Page-level key facts; insertion order is preserved
 */
export const documentMetadataSchema = z
  .record(z.string(), z.unknown().transform(stringifyMetadataValue))
  .nullish()
  .transform((metadata) => metadata ?? {});

/**
 * Content items: numbers are stringified, other non-string items dropped
 */
const contentSchema = z
  .array(z.unknown())
  .nullish()
  .transform((items) =>
    (items ?? []).flatMap((item) => {
      if (typeof item === 'string') return [item];
      if (typeof item === 'number') return [String(item)];
      return [];
    })
  );

export const sectionSchema = z.object({
  heading: lenientStringSchema,
  content: contentSchema,
});

export const intermediateDocumentSchema = z.object({
  title: lenientStringSchema,
  source: lenientStringSchema,
  category: lenientStringSchema,
  url: lenientStringSchema,
  metadata: documentMetadataSchema,
  sections: z
    .array(sectionSchema)
    .nullish()
    .transform((sections) => sections ?? []),
  page_name: lenientStringSchema,
  bbg_version: lenientStringSchema,
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function invalidPayload(payload: unknown): InvalidDocumentError {
  return new InvalidDocumentError(
    'Source payload must be a document, a list of documents or a mapping of category to documents',
    [`(root): expected object or array, received ${payload === null ? 'null' : typeof payload}`]
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A mapping with a `sections` or `title` key is a document, not a category mapping
 */
function looksLikeDocument(value: Record<string, unknown>): boolean {
  return 'sections' in value || 'title' in value;
}

/**
 * Validate one intermediate document, filling defaults
 *
 * @throws InvalidDocumentError when the input cannot be read as a document
 */
export function parseIntermediateDocument(input: unknown): IntermediateDocument {
  const result = intermediateDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidDocumentError('Invalid intermediate document', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Raw (unvalidated) documents of a source payload. The payload may be a single
 * document, a list of documents, or a mapping category key -> documents; with a
 * mapping, `key` selects one category, otherwise all categories are concatenated.
 *
 * @throws NotFoundError when `key` is not present in a category mapping
 * @throws InvalidDocumentError when the payload has none of the accepted shapes
 */
export function selectRawDocuments(payload: unknown, key?: string): unknown[] {
  if (Array.isArray(payload)) return payload;

  if (!isRecord(payload)) throw invalidPayload(payload);

  if (looksLikeDocument(payload)) return [payload];

  const keys = key === undefined ? Object.keys(payload) : [key];
  const documents: unknown[] = [];

  for (const entryKey of keys) {
    const value = payload[entryKey];
    if (value === undefined) {
      throw new NotFoundError('Category key', entryKey, { availableKeys: Object.keys(payload) });
    }
    if (Array.isArray(value)) {
      documents.push(...value);
    } else if (isRecord(value)) {
      documents.push(value);
    } else {
      throw new InvalidDocumentError(`Category '${entryKey}' does not hold documents`, [
        `${entryKey}: expected object or array`,
      ]);
    }
  }

  return documents;
}

/**
 * Validate a whole source payload into a category mapping. A bare document or list is
 * filed under DEFAULT_PAYLOAD_KEY.
 *
 * @throws InvalidDocumentError on the first document that cannot be read
 */
export function parseSourcePayload(input: unknown): SourcePayload {
  if (Array.isArray(input) || (isRecord(input) && looksLikeDocument(input))) {
    return { [DEFAULT_PAYLOAD_KEY]: selectRawDocuments(input).map(parseIntermediateDocument) };
  }

  if (!isRecord(input)) throw invalidPayload(input);

  const payload: SourcePayload = {};
  for (const key of Object.keys(input)) {
    payload[key] = selectRawDocuments(input, key).map(parseIntermediateDocument);
  }
  return payload;
}
