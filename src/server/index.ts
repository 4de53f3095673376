/**
 * Public API: chunking primitives, category normalizers, validation and the batch pipeline
 */

export type {
  Chunk,
  ChunkRecord,
  DocumentMetadata,
  IntermediateDocument,
  ParsedHeadingNode,
  Section,
  SourcePayload,
} from './contracts/types.js';

export {
  HeadingHeuristics,
  classifyHeading,
  parseHierarchicalSections,
  type HeadingHeuristicsConfig,
} from './chunking/HierarchicalSectionParser.js';
export { groupItemsByWordCount, splitByWordCount, type WordBoundedSplitOptions } from './chunking/WordBoundedSplitter.js';
export {
  chunkBySentences,
  chunkByWords,
  cleanTranscript,
  splitSentences,
  type SentenceChunkOptions,
} from './chunking/SentenceChunker.js';
export { chunkByCharacters, type ContextualChunkOptions } from './chunking/ContextualChunker.js';
export { classifyContent, type ClassifiedContent } from './chunking/FactClassifier.js';

export { formatChunk, type ChunkParts } from './normalization/ChunkFormatter.js';
export type { NormalizationPolicy, SectionRule } from './normalization/policies/NormalizationPolicy.js';
export type { DocumentNormalizer } from './normalization/strategies/DocumentNormalizer.js';
export { PolicyNormalizer, extractEntityName } from './normalization/strategies/PolicyNormalizer.js';
export { DocumentationNormalizer } from './normalization/strategies/DocumentationNormalizer.js';
export { TranscriptNormalizer } from './normalization/strategies/TranscriptNormalizer.js';
export { UnifiedNormalizationService } from './normalization/UnifiedNormalizationService.js';

export { RagDocumentProcessor, type RagDocument, type RagStatistics } from './rag/RagDocumentProcessor.js';

export {
  parseIntermediateDocument,
  parseSourcePayload,
  selectRawDocuments,
} from './validation/intermediateDocumentSchemas.js';

export { DEFAULT_CHUNKING_CONFIG, chunkingConfigFromEnv, type ChunkingConfig } from './config/chunkingConfig.js';
export { DEFAULT_NORMALIZATION_JOBS, type NormalizationJob } from './config/normalizationJobs.js';
export {
  runNormalizationJob,
  runNormalizationPipeline,
  type NormalizationJobResult,
  type NormalizationPipelineOptions,
} from './etl/pipelines/normalizationPipeline.js';

export { AppError, InvalidDocumentError, UnknownCategoryError, isAppError } from './types/errors.js';
