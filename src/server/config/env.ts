/**
 * Environment Variable Validation
 *
 * Centralized parsing of the environment variables the batch normalization run reads.
 * The chunking primitives never read the environment; values flow to them through
 * ChunkingConfig (see chunkingConfig.ts).
 */

// Load dotenv early so a local .env file is visible before the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: string;

  // Data locations
  RAW_DATA_DIR: string;
  PROCESSED_DATA_DIR: string;

  // Contextual RAG chunking (characters)
  RAG_CHUNK_SIZE: number;
  RAG_CHUNK_OVERLAP: number;

  // Transcript chunking
  TRANSCRIPT_TARGET_WORDS: number;
  TRANSCRIPT_OVERLAP_SENTENCES: number;
}

let validatedEnv: Env | null = null;

function isNodeEnv(value: string): value is Env['NODE_ENV'] {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Validate environment variables
 * Validates on first call, then returns cached result
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const chunkSize = parseNumericEnv(process.env.RAG_CHUNK_SIZE, 800);
  if (chunkSize < 1) {
    errors.push(`RAG_CHUNK_SIZE: Invalid value "${process.env.RAG_CHUNK_SIZE}". Must be a positive integer.`);
  }

  const chunkOverlap = parseNumericEnv(process.env.RAG_CHUNK_OVERLAP, 100);
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    errors.push(
      `RAG_CHUNK_OVERLAP: Invalid value "${process.env.RAG_CHUNK_OVERLAP}". Must be between 0 and RAG_CHUNK_SIZE - 1.`
    );
  }

  const targetWords = parseNumericEnv(process.env.TRANSCRIPT_TARGET_WORDS, 250);
  if (targetWords < 1) {
    errors.push(
      `TRANSCRIPT_TARGET_WORDS: Invalid value "${process.env.TRANSCRIPT_TARGET_WORDS}". Must be a positive integer.`
    );
  }

  const overlapSentences = parseNumericEnv(process.env.TRANSCRIPT_OVERLAP_SENTENCES, 2);
  if (overlapSentences < 0) {
    errors.push(
      `TRANSCRIPT_OVERLAP_SENTENCES: Invalid value "${process.env.TRANSCRIPT_OVERLAP_SENTENCES}". Must not be negative.`
    );
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL,
    RAW_DATA_DIR: process.env.RAW_DATA_DIR || 'data/raw',
    PROCESSED_DATA_DIR: process.env.PROCESSED_DATA_DIR || 'data/processed',
    RAG_CHUNK_SIZE: chunkSize,
    RAG_CHUNK_OVERLAP: chunkOverlap,
    TRANSCRIPT_TARGET_WORDS: targetWords,
    TRANSCRIPT_OVERLAP_SENTENCES: overlapSentences,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
