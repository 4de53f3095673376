/**
 * Chunking Configuration
 *
 * Default parameters of every chunking primitive, gathered in one object that callers
 * pass down explicitly. Nothing under chunking/ reads these defaults on its own.
 */

import type { Env } from './env.js';

export interface ChunkingConfig {
  /** Contextual (character-bounded) chunker */
  contextual: {
    chunkSize: number; // characters
    chunkOverlap: number; // characters
    boundarySearchWindow: number; // characters before the tentative end searched for a sentence end
  };
  /** Sentence-aware transcript chunker */
  transcript: {
    targetWords: number;
    overlapSentences: number;
    fallbackOverlapWords: number; // used by the word-window fallback
    minWords: number; // shorter transcripts are not chunked at all
  };
  /** Fact/content classifier */
  factThreshold: number; // characters
  /** Word-bounded splitter for documentation nodes */
  documentation: {
    maxWords: number;
  };
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  contextual: {
    chunkSize: 800,
    chunkOverlap: 100,
    boundarySearchWindow: 200,
  },
  transcript: {
    targetWords: 250,
    overlapSentences: 2,
    fallbackOverlapWords: 50,
    minWords: 50,
  },
  factThreshold: 200,
  documentation: {
    maxWords: 400,
  },
};

/**
 * Build the chunking configuration from validated environment values
 */
export function chunkingConfigFromEnv(env: Env): ChunkingConfig {
  return {
    ...DEFAULT_CHUNKING_CONFIG,
    contextual: {
      ...DEFAULT_CHUNKING_CONFIG.contextual,
      chunkSize: env.RAG_CHUNK_SIZE,
      chunkOverlap: env.RAG_CHUNK_OVERLAP,
    },
    transcript: {
      ...DEFAULT_CHUNKING_CONFIG.transcript,
      targetWords: env.TRANSCRIPT_TARGET_WORDS,
      overlapSentences: env.TRANSCRIPT_OVERLAP_SENTENCES,
    },
  };
}
