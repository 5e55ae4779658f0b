import 'dotenv/config';
import { createInterface } from 'readline';
import { createChatbot, type Chatbot } from './features/chatbot.js';
import { createEncoder } from './semantic/encoder.js';
import { loadIndex } from './semantic/indexFile.js';
import { loadIntentExamples, loadSnapshot } from './storage/files.js';
import { SnapshotStore } from './storage/snapshotStore.js';
import { loadConfig } from './utils/config.js';
import { logger } from './utils/logger.js';

async function startBot(): Promise<Chatbot> {
  const config = loadConfig();
  logger.info({ dataDir: config.DATA_DIR, encoder: config.SEMANTIC_ENCODER }, 'Starting campus schedule bot...');

  const store = new SnapshotStore(await loadSnapshot(config.DATA_DIR));
  const encoder = createEncoder(config);
  const examples = await loadIntentExamples(config.DATA_DIR);
  const index = config.INTENT_INDEX_PATH ? await loadIndex(config.INTENT_INDEX_PATH) : undefined;

  return createChatbot({ store, encoder, examples, config, index });
}

async function main(): Promise<void> {
  const bot = await startBot();

  const question = process.argv.slice(2).join(' ').trim();
  if (question) {
    process.stdout.write(`${await bot.answer(question, new Date())}\n`);
    return;
  }

  // one question per line until stdin closes
  const rl = createInterface({ input: process.stdin, terminal: false });
  for await (const line of rl) {
    if (!line.trim()) continue;
    process.stdout.write(`${await bot.answer(line, new Date())}\n\n`);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled Rejection');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Error running bot');
  process.exit(1);
});
