import { readFile } from 'fs/promises';
import { z } from 'zod';
import { BotError } from '../types/index.js';
import { atomicWriteJSON } from '../utils/atomic.js';
import { logger } from '../utils/logger.js';
import { IntentSchema } from '../storage/schemas.js';
import { createIndex, type EmbeddingIndex } from './intentIndex.js';

export const INDEX_FILE_VERSION = 1;

const IndexFileSchema = z.object({
  version: z.literal(INDEX_FILE_VERSION),
  createdAt: z.string(),
  model: z.string().min(1),
  dimension: z.number().int().nonnegative(),
  items: z.array(z.object({
    intent: IntentSchema,
    phrase: z.string(),
    vec: z.array(z.number())
  }))
});

export type IndexFile = z.infer<typeof IndexFileSchema>;

export async function saveIndex(filePath: string, index: EmbeddingIndex, now: Date = new Date()): Promise<void> {
  const file: IndexFile = {
    version: INDEX_FILE_VERSION,
    createdAt: now.toISOString(),
    model: index.model,
    dimension: index.dimension,
    items: index.labels.map((intent, i) => ({
      intent,
      phrase: index.phrases[i] ?? '',
      vec: [...(index.vectors[i] ?? [])]
    }))
  };
  await atomicWriteJSON(filePath, file);
  logger.info({ filePath, model: index.model, examples: file.items.length }, 'semantic.indexSaved');
}

/** Reads a saved index. A missing or malformed file is an error, never a silent rebuild. */
export async function loadIndex(filePath: string): Promise<EmbeddingIndex> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new BotError(`Cannot read index ${filePath}: ${error instanceof Error ? error.message : String(error)}`, 'INDEX_INVALID');
  }

  const parsed = IndexFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BotError(`Invalid index ${filePath}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`, 'INDEX_INVALID');
  }

  const { model, dimension, items } = parsed.data;
  if (items.some(it => it.vec.length !== dimension)) {
    throw new BotError(`Invalid index ${filePath}: vector length differs from ${dimension}`, 'INDEX_INVALID');
  }
  return createIndex(
    model,
    items.map(it => it.vec),
    items.map(it => it.intent),
    items.map(it => it.phrase)
  );
}
