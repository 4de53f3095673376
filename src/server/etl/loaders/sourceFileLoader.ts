/**
 * Source File Loader
 *
 * Reads raw scraper output from disk and hands back the raw (not yet validated)
 * documents of one job input. Validation happens per document in the pipeline so a
 * single malformed document does not fail a whole file.
 */

import fs from 'fs/promises';
import path from 'path';
import type { IntermediateDocument } from '../../contracts/types.js';
import type { JobInput, TextDocumentFields } from '../../config/normalizationJobs.js';
import { AppError, InvalidDocumentError } from '../../types/errors.js';
import { selectRawDocuments } from '../../validation/intermediateDocumentSchemas.js';

/**
 * Heading of the single section a plain-text source is wrapped into
 */
export const FULL_DOCUMENTATION_HEADING = 'Full Documentation';

/**
 * Read a UTF-8 source file
 *
 * @throws AppError (SOURCE_READ_FAILED) when the file cannot be read
 */
export async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new AppError(
      `Failed to read source file: ${error instanceof Error ? error.message : String(error)}`,
      'SOURCE_READ_FAILED',
      500,
      true,
      { path: filePath }
    );
  }
}

/**
 * Wrap a flat text dump into a single-section document
 */
export function wrapTextDocument(text: string, fields: TextDocumentFields): IntermediateDocument {
  return {
    title: fields.title,
    source: fields.source,
    category: fields.category,
    url: '',
    metadata: {},
    sections: [{ heading: FULL_DOCUMENTATION_HEADING, content: [text] }],
    page_name: '',
    bbg_version: '',
  };
}

/**
 * Parse a JSON source text
 *
 * @throws InvalidDocumentError when the text is not JSON
 */
export function parseJsonSource(text: string, filePath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidDocumentError(
      'Source file is not valid JSON',
      [`(root): ${error instanceof Error ? error.message : String(error)}`],
      { path: filePath }
    );
  }
}

/**
 * Load the raw documents of one job input
 *
 * @param rawDataDir - Directory the input path is relative to
 */
export async function loadRawDocuments(rawDataDir: string, input: JobInput): Promise<unknown[]> {
  const filePath = path.join(rawDataDir, input.path);
  const text = await readSourceFile(filePath);

  if (input.format === 'text') {
    return [wrapTextDocument(text, input.document)];
  }

  return selectRawDocuments(parseJsonSource(text, filePath), input.key);
}
