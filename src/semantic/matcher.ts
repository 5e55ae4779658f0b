import type { IntentExample } from '../types/index.js';
import { BotError } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { KeyedLock, indexLock } from '../utils/lock.js';
import type { Encoder } from './encoder.js';
import { buildEmbeddingIndex, nearest, type EmbeddingIndex, type Neighbor } from './intentIndex.js';

export const DEFAULT_MAX_DISTANCE = 0.9;

const REBUILD_KEY = 'semantic-index';

export interface SemanticMatcherOptions {
  maxDistance?: number;
  lock?: KeyedLock;
}

/**
 * Nearest-example intent matcher. The index is swapped whole on rebuild, so
 * a query always reads either the old index or the new one.
 */
export class SemanticMatcher {
  private index: EmbeddingIndex;
  private readonly maxDistance: number;
  private readonly lock: KeyedLock;

  constructor(private readonly encoder: Encoder, index: EmbeddingIndex, opts: SemanticMatcherOptions = {}) {
    if (index.model !== encoder.model) {
      throw new BotError(`Index built with ${index.model}, encoder is ${encoder.model}`, 'INDEX_INVALID');
    }
    this.index = index;
    this.maxDistance = opts.maxDistance ?? DEFAULT_MAX_DISTANCE;
    this.lock = opts.lock ?? indexLock;
  }

  static async build(
    encoder: Encoder,
    examples: readonly IntentExample[],
    opts: SemanticMatcherOptions = {}
  ): Promise<SemanticMatcher> {
    const index = await buildEmbeddingIndex(encoder, examples);
    logger.info({ model: index.model, examples: index.labels.length }, 'semantic.indexBuilt');
    return new SemanticMatcher(encoder, index, opts);
  }

  get currentIndex(): EmbeddingIndex {
    return this.index;
  }

  async nearest(text: string): Promise<Neighbor | null> {
    const index = this.index;
    if (index.vectors.length === 0) return null;
    const [vec] = await this.encoder.encode([text]);
    if (!vec) return null;
    return nearest(index, vec);
  }

  /** Nearest example's intent when it lies within the confidence distance. */
  async match(text: string): Promise<Neighbor | null> {
    const hit = await this.nearest(text);
    if (!hit) return null;
    if (hit.distance > this.maxDistance) {
      logger.debug({ distance: hit.distance, phrase: hit.phrase }, 'semantic.belowConfidence');
      return null;
    }
    return hit;
  }

  /**
   * Maintenance only. Concurrent rebuilds run one after another; the live
   * index is replaced after the new one is complete.
   */
  async rebuild(examples: readonly IntentExample[]): Promise<EmbeddingIndex> {
    return await this.lock.withLock(REBUILD_KEY, async () => {
      const next = await buildEmbeddingIndex(this.encoder, examples);
      this.index = next;
      logger.info({ model: next.model, examples: next.labels.length }, 'semantic.indexRebuilt');
      return next;
    });
  }
}
