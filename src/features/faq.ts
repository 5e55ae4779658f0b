import type { FAQEntry } from '../types/index.js';
import { normalizeText } from '../nlu/extractors.js';

const STOP_WORDS = new Set([
  'the', 'what', 'how', 'are', 'is', 'can', 'do', 'for', 'and', 'you', 'your',
  'who', 'when', 'where', 'which', 'why', 'does', 'did', 'was', 'were', 'will',
  'this', 'that', 'with', 'from', 'have', 'has', 'about', 'there', 'please', 'tell'
]);

export const SCORE_EXACT = 1000;
export const SCORE_CONTAINS = 500;
export const SCORE_SHARED_TOKEN = 10;
export const SCORE_ANSWER_TOKEN = 5;
export const DEFAULT_FAQ_MIN_SCORE = 10;

export function meaningfulTokens(text: string): string[] {
  const seen = new Set<string>();
  for (const tok of normalizeText(text).split(' ')) {
    if (tok.length <= 2 || STOP_WORDS.has(tok)) continue;
    seen.add(tok);
  }
  return [...seen];
}

interface PreparedEntry {
  entry: FAQEntry;
  normalizedQuestion: string;
  tokens: Set<string>;
  answerText: string;
}

export interface FaqHit {
  entry: FAQEntry;
  score: number;
}

/**
 * Lexical matcher over the active FAQ catalog. The catalog is prepared once
 * and never changes for the lifetime of the matcher.
 */
export class FaqMatcher {
  private readonly entries: readonly PreparedEntry[];

  constructor(catalog: readonly FAQEntry[], private readonly minScore = DEFAULT_FAQ_MIN_SCORE) {
    this.entries = Object.freeze(
      catalog
        .filter(e => e.active)
        .map(entry => ({
          entry,
          normalizedQuestion: normalizeText(entry.question),
          tokens: new Set(meaningfulTokens(entry.question)),
          answerText: entry.answer.toLowerCase()
        }))
    );
  }

  get size(): number {
    return this.entries.length;
  }

  private scorePrepared(q: string, tokens: string[], candidate: PreparedEntry): number {
    if (!q || !candidate.normalizedQuestion) return 0;
    if (q === candidate.normalizedQuestion) return SCORE_EXACT;
    if (candidate.normalizedQuestion.includes(q) || q.includes(candidate.normalizedQuestion)) return SCORE_CONTAINS;

    let shared = 0;
    let inAnswer = 0;
    for (const tok of tokens) {
      if (candidate.tokens.has(tok)) shared++;
      if (candidate.answerText.includes(tok)) inAnswer++;
    }
    return SCORE_SHARED_TOKEN * shared + SCORE_ANSWER_TOKEN * inAnswer;
  }

  /** Best entry at or above the minimum score; ties keep catalog order. */
  match(text: string): FaqHit | null {
    const q = normalizeText(text);
    const tokens = meaningfulTokens(text);
    // nothing but stop-words ("is it"), would otherwise be a substring of everything
    if (tokens.length === 0) return null;

    let best: FaqHit | null = null;
    for (const candidate of this.entries) {
      const score = this.scorePrepared(q, tokens, candidate);
      if (!best || score > best.score) best = { entry: candidate.entry, score };
    }
    return best && best.score >= this.minScore ? best : null;
  }
}
