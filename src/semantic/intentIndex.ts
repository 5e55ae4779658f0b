import type { Intent, IntentExample } from '../types/index.js';
import { BotError } from '../types/index.js';
import { euclidean, type DenseVec, type Encoder } from './encoder.js';

export interface EmbeddingIndex {
  readonly model: string;
  readonly dimension: number;
  readonly vectors: readonly (readonly number[])[];
  readonly labels: readonly Intent[];
  /** Example phrase behind each vector, for logs. */
  readonly phrases: readonly string[];
}

export interface Neighbor {
  intent: Intent;
  phrase: string;
  distance: number;
}

export function createIndex(
  model: string,
  vectors: readonly DenseVec[],
  labels: readonly Intent[],
  phrases: readonly string[]
): EmbeddingIndex {
  if (vectors.length !== labels.length || phrases.length !== labels.length) {
    throw new BotError(
      `Index has ${vectors.length} vectors, ${labels.length} labels and ${phrases.length} phrases`,
      'INDEX_INVALID'
    );
  }
  const dimension = vectors[0]?.length ?? 0;
  if (vectors.some(v => v.length !== dimension)) {
    throw new BotError('Index vectors differ in length', 'INDEX_INVALID');
  }
  return Object.freeze({
    model,
    dimension,
    vectors: Object.freeze(vectors.map(v => Object.freeze([...v]))),
    labels: Object.freeze([...labels]),
    phrases: Object.freeze([...phrases])
  });
}

/** Encodes every example phrase, in catalog order. */
export async function buildEmbeddingIndex(
  encoder: Encoder,
  examples: readonly IntentExample[]
): Promise<EmbeddingIndex> {
  const phrases: string[] = [];
  const labels: Intent[] = [];
  for (const ex of examples) {
    for (const phrase of ex.examples) {
      if (!phrase.trim()) continue;
      phrases.push(phrase);
      labels.push(ex.intent);
    }
  }
  const vectors = await encoder.encode(phrases);
  return createIndex(encoder.model, vectors, labels, phrases);
}

/** Closest example by Euclidean distance; the earlier example wins a tie. */
export function nearest(index: EmbeddingIndex, query: readonly number[]): Neighbor | null {
  let best: Neighbor | null = null;
  for (let i = 0; i < index.vectors.length; i++) {
    const vec = index.vectors[i];
    const intent = index.labels[i];
    const phrase = index.phrases[i];
    if (!vec || intent === undefined || phrase === undefined) continue;
    const distance = euclidean(vec, query);
    if (!best || distance < best.distance) best = { intent, phrase, distance };
  }
  return best;
}
