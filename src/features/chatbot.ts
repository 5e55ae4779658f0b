import type { DataStore, Department, Entities, Faculty, Intent, IntentExample, MatchStage, Query } from '../types/index.js';
import { extractWeekday, normalizeText } from '../nlu/extractors.js';
import { classify } from '../nlu/rules.js';
import { SemanticMatcher } from '../semantic/matcher.js';
import type { Encoder } from '../semantic/encoder.js';
import type { EmbeddingIndex } from '../semantic/intentIndex.js';
import type { BotConfig } from '../utils/config.js';
import { generateQueryId } from '../utils/id.js';
import { logger } from '../utils/logger.js';
import { getDayName, toISODate } from '../utils/time.js';
import { formatFaq, formatHelp, formatUnknown } from '../ux/responses.js';
import { FaqMatcher } from './faq.js';
import { HANDLERS } from './handlers.js';

export type ChatbotSettings = Pick<BotConfig, 'TIMEZONE' | 'MAX_PERIOD'>;

export interface ChatbotDeps {
  store: DataStore;
  faq: FaqMatcher;
  semantic: SemanticMatcher;
  settings: ChatbotSettings;
}

interface Outcome {
  stage: MatchStage;
  intent: Intent | null;
  text: string;
}

/**
 * Question in, one answer out. Rules first, then the FAQ catalog, then the
 * nearest example phrase, then a default reply. Store failures reject.
 */
export class Chatbot {
  constructor(private readonly deps: ChatbotDeps) {}

  async answer(question: string, today: Date | string): Promise<string> {
    const tz = this.deps.settings.TIMEZONE;
    const todayIso = toISODate(today, tz);
    const query: Query = {
      id: generateQueryId(),
      rawText: question,
      normalizedText: normalizeText(question),
      today: todayIso,
      dayName: getDayName(todayIso, tz),
      entities: {}
    };

    try {
      const outcome = await this.dispatch(query);
      logger.info({ queryId: query.id, intent: outcome.intent, stage: outcome.stage }, 'chatbot.answer');
      return outcome.text;
    } catch (error) {
      logger.error({ err: error, queryId: query.id }, 'chatbot.failed');
      throw error;
    }
  }

  private async dispatch(query: Query): Promise<Outcome> {
    const text = query.normalizedText;
    // "?" and punctuation-only input normalize to nothing
    if (!text) return { stage: 'default', intent: 'help', text: formatHelp() };

    const [faculty, departments] = await Promise.all([
      this.deps.store.allActiveFaculty(),
      this.deps.store.departments()
    ]);

    const hit = classify(text, { faculty, departments });
    if (hit) {
      logger.debug({ queryId: query.id, rule: hit.rule }, 'chatbot.ruleHit');
      return this.run('rule', hit.intent, { ...query, entities: hit.entities }, faculty, departments);
    }

    const faq = this.deps.faq.match(query.rawText);
    if (faq) {
      logger.debug({ queryId: query.id, score: faq.score }, 'chatbot.faqHit');
      return { stage: 'faq', intent: null, text: formatFaq(faq.entry) };
    }

    const neighbor = await this.deps.semantic.match(text);
    if (neighbor) {
      logger.debug({ queryId: query.id, phrase: neighbor.phrase, distance: neighbor.distance }, 'chatbot.semanticHit');
      const weekday = extractWeekday(text);
      const entities: Entities = weekday ? { weekday } : {};
      return this.run('semantic', neighbor.intent, { ...query, entities }, faculty, departments);
    }

    return { stage: 'default', intent: null, text: formatUnknown(query.dayName) };
  }

  private async run(
    stage: MatchStage,
    intent: Intent,
    query: Query,
    faculty: readonly Faculty[],
    departments: readonly Department[]
  ): Promise<Outcome> {
    const text = await HANDLERS[intent]({
      query,
      store: this.deps.store,
      faculty,
      departments,
      timezone: this.deps.settings.TIMEZONE,
      maxPeriod: this.deps.settings.MAX_PERIOD
    });
    return { stage, intent, text };
  }
}

export interface CreateChatbotOptions {
  store: DataStore;
  encoder: Encoder;
  examples: readonly IntentExample[];
  config: Pick<BotConfig, 'TIMEZONE' | 'MAX_PERIOD' | 'FAQ_MIN_SCORE' | 'SEMANTIC_MAX_DISTANCE'>;
  /** Prebuilt index; built from `examples` when absent. */
  index?: EmbeddingIndex;
}

/** Loads the FAQ catalog and the intent index once and wires them into a Chatbot. */
export async function createChatbot(opts: CreateChatbotOptions): Promise<Chatbot> {
  const { store, encoder, examples, config } = opts;
  const faq = new FaqMatcher(await store.faqCatalog(), config.FAQ_MIN_SCORE);
  const semanticOpts = { maxDistance: config.SEMANTIC_MAX_DISTANCE };
  const semantic = opts.index
    ? new SemanticMatcher(encoder, opts.index, semanticOpts)
    : await SemanticMatcher.build(encoder, examples, semanticOpts);

  logger.info({ faqEntries: faq.size, examples: semantic.currentIndex.labels.length }, 'chatbot.ready');
  return new Chatbot({
    store,
    faq,
    semantic,
    settings: { TIMEZONE: config.TIMEZONE, MAX_PERIOD: config.MAX_PERIOD }
  });
}
