/**
 * Build contextual RAG documents from the official wiki dump
 *
 * Usage: tsx src/server/scripts/build-rag-documents.ts
 * Reads RAW_DATA_DIR/civ6_wiki/civ6_complete_data.json and writes
 * PROCESSED_DATA_DIR/rag/civ6_rag_documents.json (see config/env.ts).
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { chunkingConfigFromEnv } from '../config/chunkingConfig.js';
import { getEnv } from '../config/env.js';
import { writeJsonFile } from '../etl/loaders/chunkFileWriter.js';
import { parseJsonSource, readSourceFile } from '../etl/loaders/sourceFileLoader.js';
import { RagDocumentProcessor } from '../rag/RagDocumentProcessor.js';
import { parseSourcePayload } from '../validation/intermediateDocumentSchemas.js';

async function buildRagDocuments(): Promise<void> {
  const env = getEnv();
  const config = chunkingConfigFromEnv(env);
  const inputPath = path.join(env.RAW_DATA_DIR, 'civ6_wiki', 'civ6_complete_data.json');
  const outputPath = path.join(env.PROCESSED_DATA_DIR, 'rag', 'civ6_rag_documents.json');

  console.log('🔄 Building RAG documents\n');

  const payload = parseSourcePayload(parseJsonSource(await readSourceFile(inputPath), inputPath));
  const processor = new RagDocumentProcessor(config.contextual);
  const documents = processor.processAll(payload);

  await writeJsonFile(outputPath, documents);

  const stats = processor.getStatistics(documents);
  console.log(`✅ Saved ${stats.totalDocuments} documents to ${outputPath}`);
  console.log(`   Average content length: ${stats.avgContentLength.toFixed(1)} characters`);
  for (const [category, count] of Object.entries(stats.categories)) {
    console.log(`   ${category}: ${count}`);
  }
  console.log(`   Sources: ${stats.sources.join(', ')}`);
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url) || process.argv[1]?.includes('build-rag-documents')) {
  buildRagDocuments()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error('\n❌ Script failed:', error);
      process.exit(1);
    });
}

export { buildRagDocuments };
