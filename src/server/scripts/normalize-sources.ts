/**
 * Normalize every configured raw source into chunk files
 *
 * Usage: tsx src/server/scripts/normalize-sources.ts
 * Reads RAW_DATA_DIR and writes PROCESSED_DATA_DIR (see config/env.ts).
 */

import { fileURLToPath } from 'url';
import { chunkingConfigFromEnv } from '../config/chunkingConfig.js';
import { getEnv } from '../config/env.js';
import { runNormalizationPipeline } from '../etl/pipelines/normalizationPipeline.js';
import { UnifiedNormalizationService } from '../normalization/UnifiedNormalizationService.js';

async function normalizeSources(): Promise<boolean> {
  const env = getEnv();
  const service = new UnifiedNormalizationService(chunkingConfigFromEnv(env));

  console.log('🔄 Normalizing raw sources\n');

  const results = await runNormalizationPipeline({
    rawDataDir: env.RAW_DATA_DIR,
    processedDataDir: env.PROCESSED_DATA_DIR,
    service,
  });

  for (const result of results) {
    if (result.status === 'completed') {
      const skipped = result.skippedDocuments > 0 ? ` (${result.skippedDocuments} invalid documents skipped)` : '';
      console.log(`✅ ${result.name}: ${result.chunkCount} chunks -> ${result.outputPath}${skipped}`);
    } else {
      console.log(`❌ ${result.name}: ${result.error?.code} ${result.error?.message}`);
    }
  }

  return results.every((result) => result.status === 'completed');
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url) || process.argv[1]?.includes('normalize-sources')) {
  normalizeSources()
    .then((allCompleted) => {
      process.exit(allCompleted ? 0 : 1);
    })
    .catch((error) => {
      console.error('\n❌ Script failed:', error);
      process.exit(1);
    });
}

export { normalizeSources };
