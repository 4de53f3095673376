/**
 * Normalization Pipeline
 *
 * Batch driver: for each configured job, load the raw documents, validate them one by
 * one, normalize them with the category's normalizer and write the chunk file. Jobs are
 * independent; a failing job is reported in the results and the remaining jobs still run.
 */

import path from 'path';
import type { IntermediateDocument } from '../../contracts/types.js';
import { DEFAULT_NORMALIZATION_JOBS, type NormalizationJob } from '../../config/normalizationJobs.js';
import { UnifiedNormalizationService } from '../../normalization/UnifiedNormalizationService.js';
import { isAppError, InvalidDocumentError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { parseIntermediateDocument } from '../../validation/intermediateDocumentSchemas.js';
import { writeChunkFile } from '../loaders/chunkFileWriter.js';
import { loadRawDocuments } from '../loaders/sourceFileLoader.js';

const pipelineLogger = createChildLogger({ component: 'normalization-pipeline' });

export interface NormalizationPipelineOptions {
  rawDataDir: string;
  processedDataDir: string;
  jobs?: readonly NormalizationJob[];
  service?: UnifiedNormalizationService;
}

export interface NormalizationJobResult {
  name: string;
  category: string;
  outputPath: string;
  status: 'completed' | 'failed';
  documentCount: number;
  skippedDocuments: number;
  chunkCount: number;
  error?: {
    code: string;
    message: string;
  };
}

interface ValidatedDocuments {
  documents: IntermediateDocument[];
  skipped: number;
}

/**
 * Validate raw documents, skipping (and logging) the ones that cannot be read
 */
function validateDocuments(job: NormalizationJob, rawDocuments: readonly unknown[]): ValidatedDocuments {
  const documents: IntermediateDocument[] = [];
  let skipped = 0;

  rawDocuments.forEach((raw, index) => {
    try {
      documents.push(parseIntermediateDocument(raw));
    } catch (error) {
      if (!(error instanceof InvalidDocumentError)) throw error;
      skipped++;
      pipelineLogger.warn({ job: job.name, index, issues: error.issues }, 'Skipping invalid document');
    }
  });

  return { documents, skipped };
}

/**
 * Run one job. Errors propagate; see runNormalizationPipeline for per-job isolation.
 */
export async function runNormalizationJob(
  job: NormalizationJob,
  options: NormalizationPipelineOptions
): Promise<NormalizationJobResult> {
  const service = options.service ?? new UnifiedNormalizationService();
  const outputPath = path.join(options.processedDataDir, job.output);

  const rawDocuments = await loadRawDocuments(options.rawDataDir, job.input);
  const { documents, skipped } = validateDocuments(job, rawDocuments);
  const chunks = service.normalizeDocuments(job.category, documents);

  await writeChunkFile(outputPath, chunks);

  pipelineLogger.info(
    {
      job: job.name,
      category: job.category,
      documentCount: documents.length,
      skippedDocuments: skipped,
      chunkCount: chunks.length,
      outputPath,
    },
    'Normalization job completed'
  );

  return {
    name: job.name,
    category: job.category,
    outputPath,
    status: 'completed',
    documentCount: documents.length,
    skippedDocuments: skipped,
    chunkCount: chunks.length,
  };
}

/**
 * Run every job in order and collect one result per job
 */
export async function runNormalizationPipeline(
  options: NormalizationPipelineOptions
): Promise<NormalizationJobResult[]> {
  const jobs = options.jobs ?? DEFAULT_NORMALIZATION_JOBS;
  const service = options.service ?? new UnifiedNormalizationService();
  const results: NormalizationJobResult[] = [];

  for (const job of jobs) {
    try {
      results.push(await runNormalizationJob(job, { ...options, service }));
    } catch (error) {
      const code = isAppError(error) ? error.code : 'NORMALIZATION_FAILED';
      const message = error instanceof Error ? error.message : String(error);

      pipelineLogger.error({ job: job.name, code, error: message }, 'Normalization job failed');

      results.push({
        name: job.name,
        category: job.category,
        outputPath: path.join(options.processedDataDir, job.output),
        status: 'failed',
        documentCount: 0,
        skippedDocuments: 0,
        chunkCount: 0,
        error: { code, message },
      });
    }
  }

  return results;
}
