import 'dotenv/config';
import { join } from 'path';
import { createEncoder } from '../semantic/encoder.js';
import { saveIndex } from '../semantic/indexFile.js';
import { buildEmbeddingIndex } from '../semantic/intentIndex.js';
import { loadIntentExamples } from '../storage/files.js';
import { loadConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

// Writes the intent index to INTENT_INDEX_PATH, or <DATA_DIR>/intent_index.json
async function main(): Promise<void> {
  const config = loadConfig();
  const target = config.INTENT_INDEX_PATH ?? join(config.DATA_DIR, 'intent_index.json');

  const examples = await loadIntentExamples(config.DATA_DIR);
  const index = await buildEmbeddingIndex(createEncoder(config), examples);
  await saveIndex(target, index);
  logger.info({ target, model: index.model, examples: index.labels.length }, 'Intent index written');
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Index build failed');
  process.exit(1);
});
