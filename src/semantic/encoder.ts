import { GoogleGenAI } from '@google/genai';
import { normalizeText } from '../nlu/extractors.js';
import { BotError } from '../types/index.js';
import type { BotConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

export type DenseVec = number[];

export interface Encoder {
  /** Identifies the vector space; an index built with one model is useless to another. */
  readonly model: string;
  readonly dimension: number;
  encode(texts: readonly string[]): Promise<DenseVec[]>;
}

export function l2normalize(v: readonly number[]): DenseVec {
  let sum = 0;
  for (const x of v) sum += x * x;
  const norm = Math.sqrt(sum);
  if (!Number.isFinite(norm) || norm === 0) return v.map(() => 0);
  return v.map(x => x / norm);
}

export function euclidean(a: readonly number[], b: readonly number[]): number {
  const n = Math.max(a.length, b.length);
  let s = 0;
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    s += d * d;
  }
  return Math.sqrt(s);
}

// 32-bit FNV-1a
function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export const HASHING_DIMENSION = 512;

/**
 * In-process encoder: hashed word unigrams plus character trigrams of each
 * padded word, unit-normalized. Deterministic and free of network access.
 */
export class HashingEncoder implements Encoder {
  readonly model: string;

  constructor(readonly dimension = HASHING_DIMENSION) {
    this.model = `hashing-v1-${dimension}`;
  }

  features(text: string): string[] {
    const out: string[] = [];
    for (const word of normalizeText(text).split(' ')) {
      if (!word) continue;
      out.push(`w:${word}`);
      const padded = `^${word}$`;
      for (let i = 0; i + 3 <= padded.length; i++) out.push(`c:${padded.slice(i, i + 3)}`);
    }
    return out;
  }

  encodeOne(text: string): DenseVec {
    const v = new Array<number>(this.dimension).fill(0);
    for (const f of this.features(text)) {
      const slot = fnv1a(f) % this.dimension;
      v[slot] = (v[slot] ?? 0) + 1;
    }
    return l2normalize(v);
  }

  async encode(texts: readonly string[]): Promise<DenseVec[]> {
    return texts.map(t => this.encodeOne(t));
  }
}

export interface GeminiEncoderOptions {
  apiKey: string;
  model: string;
  dimension?: number;
}

/**
 * Embeddings from the Gemini API. Failures propagate to the caller.
 */
export class GeminiEncoder implements Encoder {
  readonly model: string;
  readonly dimension: number;
  private readonly apiModel: string;
  private readonly ai: GoogleGenAI;

  constructor(opts: GeminiEncoderOptions) {
    this.ai = new GoogleGenAI({ apiKey: opts.apiKey });
    this.model = `gemini:${opts.model}`;
    this.dimension = opts.dimension ?? 768;
    this.apiModel = opts.model;
  }

  async encode(texts: readonly string[]): Promise<DenseVec[]> {
    if (texts.length === 0) return [];
    const res = await this.ai.models.embedContent({
      model: this.apiModel,
      contents: [...texts]
    });
    const embeddings = res.embeddings ?? [];
    if (embeddings.length !== texts.length) {
      logger.error({ expected: texts.length, got: embeddings.length }, 'gemini.embed.countMismatch');
      throw new Error(`Gemini returned ${embeddings.length} embeddings for ${texts.length} texts`);
    }
    return embeddings.map(e => l2normalize(e.values ?? []));
  }
}

export function createEncoder(
  config: Pick<BotConfig, 'SEMANTIC_ENCODER' | 'GEMINI_API_KEY' | 'GEMINI_EMBED_MODEL'>
): Encoder {
  if (config.SEMANTIC_ENCODER === 'hashing') return new HashingEncoder();
  if (!config.GEMINI_API_KEY) {
    throw new BotError('GEMINI_API_KEY is required when SEMANTIC_ENCODER=gemini', 'CONFIG_INVALID');
  }
  return new GeminiEncoder({ apiKey: config.GEMINI_API_KEY, model: config.GEMINI_EMBED_MODEL });
}
