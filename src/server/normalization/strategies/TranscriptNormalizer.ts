/**
 * TranscriptNormalizer - Video transcripts into overlapping, sentence-aligned parts
 */

import type { Chunk, IntermediateDocument } from '../../contracts/types.js';
import {
  DEFAULT_SENTENCE_CHUNK_OPTIONS,
  chunkBySentences,
  cleanTranscript,
  type SentenceChunkOptions,
} from '../../chunking/SentenceChunker.js';
import { countWords } from '../../utils/textUtils.js';
import { formatChunk } from '../ChunkFormatter.js';
import type { DocumentNormalizer } from './DocumentNormalizer.js';

export interface TranscriptNormalizerOptions extends Partial<SentenceChunkOptions> {
  /** Cleaned transcripts with fewer words are dropped */
  minWords?: number;
}

export class TranscriptNormalizer implements DocumentNormalizer {
  private readonly chunkOptions: SentenceChunkOptions;
  private readonly minWords: number;

  constructor(options: TranscriptNormalizerOptions = {}) {
    const { minWords, ...chunkOptions } = options;
    this.chunkOptions = { ...DEFAULT_SENTENCE_CHUNK_OPTIONS, ...chunkOptions };
    this.minWords = minWords ?? 50;
  }

  getName(): string {
    return 'video_transcripts';
  }

  normalize(document: IntermediateDocument): Chunk[] {
    const provenance = [document.source, document.category, document.metadata.channel ?? ''];
    const chunks: Chunk[] = [];

    for (const section of document.sections) {
      if (section.content.length === 0) continue;

      const transcript = cleanTranscript(section.content.join(' '));
      if (countWords(transcript) < this.minWords) continue;

      const parts = chunkBySentences(transcript, this.chunkOptions);
      parts.forEach((part, index) => {
        chunks.push(
          formatChunk({
            title: document.title,
            section: `Part ${index + 1}/${parts.length}`,
            mainContent: [part],
            provenance,
            reference: { label: 'Video', value: document.url },
          })
        );
      });
    }

    return chunks;
  }
}
