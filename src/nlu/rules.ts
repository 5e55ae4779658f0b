import type { ClassType, Department, Entities, Faculty, Intent } from '../types/index.js';
import {
  extractDepartment,
  extractLabNumber,
  extractPeriod,
  extractPerson,
  extractSession,
  extractWeekday
} from './extractors.js';
import {
  CLASS_TYPE_PHRASES,
  DETAIL_WORDS,
  FACULTY_WORDS,
  GREETINGS,
  GREETING_FILLERS,
  GREETING_TAIL_WORDS,
  HELP_PHRASES,
  LIST_WORDS,
  TOKENS,
  TOPIC_WORDS,
  hasPhrase
} from './intentTokens.js';

export interface RuleContext {
  faculty: readonly Faculty[];
  departments: readonly Department[];
}

export interface RuleMatch {
  intent: Intent;
  entities: Entities;
}

export interface Rule {
  name: string;
  match(text: string, ctx: RuleContext): RuleMatch | null;
}

function withWeekday(text: string, entities: Entities): Entities {
  const weekday = extractWeekday(text);
  return weekday ? { ...entities, weekday } : entities;
}

function isGreeting(text: string): boolean {
  return GREETINGS.some(g => {
    if (text === g) return true;
    if (!text.startsWith(`${g} `)) return false;
    // "hello there" greets, "hi period 3" asks
    const tail = text.slice(g.length).trim().split(' ');
    return tail.length <= GREETING_TAIL_WORDS && tail.every(w => GREETING_FILLERS.includes(w));
  });
}

function isHelp(text: string): boolean {
  return HELP_PHRASES.includes(text) || text.startsWith('help ');
}

const CLASS_TYPES: readonly ClassType[] = ['lab', 'theory', 'mini-project'];

function classTypeOf(text: string): ClassType | null {
  for (const type of CLASS_TYPES) {
    if (hasPhrase(text, CLASS_TYPE_PHRASES[type])) return type;
  }
  return null;
}

function phraseRule(intent: Intent, phrases: readonly string[]): Rule {
  return {
    name: intent,
    match: (text) => (hasPhrase(text, phrases) ? { intent, entities: withWeekday(text, {}) } : null)
  };
}

/**
 * Most specific first. The first rule that matches decides the intent;
 * a generic keyword such as "schedule" must never shadow a named
 * faculty, department or period.
 */
export const RULES: readonly Rule[] = [
  {
    name: 'greeting',
    match: (text) => (isGreeting(text) ? { intent: 'greeting', entities: {} } : null)
  },
  {
    name: 'help',
    match: (text) => (isHelp(text) ? { intent: 'help', entities: {} } : null)
  },
  {
    name: 'faculty',
    match: (text, ctx) => {
      const faculty = extractPerson(text, ctx.faculty);
      if (!faculty) return null;
      const intent: Intent = hasPhrase(text, TOPIC_WORDS)
        ? 'faculty_topic'
        : hasPhrase(text, DETAIL_WORDS) ? 'faculty_details' : 'faculty_schedule';
      return { intent, entities: withWeekday(text, { faculty }) };
    }
  },
  {
    name: 'department',
    match: (text, ctx) => {
      const department = extractDepartment(text, ctx.departments);
      return department ? { intent: 'department_schedule', entities: withWeekday(text, { department }) } : null;
    }
  },
  {
    name: 'class_type',
    match: (text) => {
      const classType = classTypeOf(text);
      return classType ? { intent: 'class_type', entities: withWeekday(text, { classType }) } : null;
    }
  },
  {
    name: 'period',
    match: (text) => {
      const period = extractPeriod(text);
      return period !== null ? { intent: 'period_schedule', entities: withWeekday(text, { period }) } : null;
    }
  },
  {
    name: 'weekday',
    match: (text) => {
      const weekday = extractWeekday(text);
      return weekday ? { intent: 'weekday_schedule', entities: { weekday } } : null;
    }
  },
  {
    name: 'session',
    match: (text) => {
      const session = extractSession(text);
      return session !== null ? { intent: 'session_ppt', entities: { session } } : null;
    }
  },
  {
    name: 'lab_program',
    match: (text) => {
      const lab = extractLabNumber(text);
      return lab !== null ? { intent: 'lab_program', entities: { lab } } : null;
    }
  },
  // absentee before summary before schedule: "schedule" alone must not swallow "absent"
  phraseRule('absentees', TOKENS.absentees),
  phraseRule('today_summary', TOKENS.today_summary),
  phraseRule('topics_today', TOKENS.topics_today),
  phraseRule('teaching_history', TOKENS.teaching_history),
  {
    name: 'list_faculty',
    match: (text) => (hasPhrase(text, LIST_WORDS) && hasPhrase(text, FACULTY_WORDS)
      ? { intent: 'list_faculty', entities: {} }
      : null)
  },
  phraseRule('today_schedule', TOKENS.today_schedule)
];

export type Classification = RuleMatch & { rule: string };

export function classify(text: string, ctx: RuleContext, rules: readonly Rule[] = RULES): Classification | null {
  for (const rule of rules) {
    const hit = rule.match(text, ctx);
    if (hit) return { ...hit, rule: rule.name };
  }
  return null;
}
