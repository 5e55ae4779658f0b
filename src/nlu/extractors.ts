import type { DayName, Department, Faculty, Query } from '../types/index.js';
import { WEEKDAYS, addDays, getDayName } from '../utils/time.js';

/**
 * Lowercase, strip accents and apostrophes, keep letters, digits and hyphens.
 * Every extractor and phrase table works on this form.
 */
export function normalizeText(s: string): string {
  return String(s || '')
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/['\u2018\u2019`]/g, '')
    .replace(/[^a-z0-9\s-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface NumberSlotSpec {
  keywords: readonly string[];
  /** Words allowed between keyword and digits ("period number 3"). */
  fillers?: readonly string[];
  /** "3rd period" */
  ordinalBeforeKeyword?: boolean;
  /** "in the 4th" with the keyword left out */
  bareOrdinal?: boolean;
}

export const NUMBER_SLOTS = {
  period: {
    keywords: ['period'],
    fillers: ['number', 'no'],
    ordinalBeforeKeyword: true,
    bareOrdinal: true
  },
  session: {
    keywords: ['session', 'ses', 'deck', 'ppt', 'slide', 'slides', 'presentation'],
    fillers: ['number', 'no'],
    ordinalBeforeKeyword: true
  },
  lab: {
    keywords: ['week', 'lab', 'inlab', 'w'],
    fillers: ['number', 'no', 'program'],
    ordinalBeforeKeyword: true
  }
} satisfies Record<string, NumberSlotSpec>;

export type NumberSlot = keyof typeof NUMBER_SLOTS;

// "in the 4th week" names a week, not a period
const BARE_ORDINAL_STOP = 'weeks?|labs?|sessions?|decks?|ppts?|slides?|units?|sem|semester|years?';

const slotPatterns = new Map<NumberSlotSpec, RegExp>();

function alternation(words: readonly string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

function compileSlot(spec: NumberSlotSpec): RegExp {
  const cached = slotPatterns.get(spec);
  if (cached) return cached;

  const kw = alternation(spec.keywords);
  const filler = spec.fillers && spec.fillers.length
    ? `(?:(?:${alternation(spec.fillers)})\\s*)?`
    : '';
  const forms = [`\\b(?:${kw})\\s*${filler}(\\d+)`];
  if (spec.ordinalBeforeKeyword) forms.push(`\\b(\\d+)(?:st|nd|rd|th)\\s*(?:${kw})\\b`);
  if (spec.bareOrdinal) {
    forms.push(`\\b(?:in|at|during)\\s+the\\s+(\\d+)(?:st|nd|rd|th)\\b(?!\\s*(?:${BARE_ORDINAL_STOP})\\b)`);
  }

  const re = new RegExp(forms.join('|'));
  slotPatterns.set(spec, re);
  return re;
}

/**
 * First keyword/number pairing in reading order, or null.
 */
export function extractNumber(text: string, spec: NumberSlotSpec): number | null {
  const m = compileSlot(spec).exec(text);
  if (!m) return null;
  const digits = m.slice(1).find((g): g is string => typeof g === 'string');
  if (!digits) return null;
  const n = Number.parseInt(digits, 10);
  // too many digits to hold exactly: still a number, and never a valid one
  return Number.isSafeInteger(n) ? n : Number.POSITIVE_INFINITY;
}

export const extractPeriod = (text: string) => extractNumber(text, NUMBER_SLOTS.period);
export const extractSession = (text: string) => extractNumber(text, NUMBER_SLOTS.session);
export const extractLabNumber = (text: string) => extractNumber(text, NUMBER_SLOTS.lab);

/** Weekday named earliest in the text. */
export function extractWeekday(text: string): DayName | null {
  const t = String(text || '').toLowerCase();
  let best: { day: DayName; at: number } | null = null;
  for (const day of WEEKDAYS) {
    const at = t.indexOf(day.toLowerCase());
    if (at >= 0 && (!best || at < best.at)) best = { day, at };
  }
  return best ? best.day : null;
}

// Code parts that are also everyday words: "is it a lab day" is not IT-A
const WORD_LIKE_PARTS = new Set(['it', 'me', 'is', 'as', 'at', 'in', 'on', 'or', 'an', 'be', 'do', 'go', 'so', 'to', 'up', 'we']);

function departmentPattern(code: string): RegExp {
  const parts = normalizeText(code).split(/[\s-]+/).filter(Boolean);
  // "aids-a", "aids a" and "aidsa" all spell AIDS-A; the outer \b keeps "ra" out of "programming"
  const separator = parts.some(p => WORD_LIKE_PARTS.has(p)) ? '-?' : '[\\s-]?';
  return new RegExp(`\\b${parts.map(escapeRegExp).join(separator)}\\b`);
}

export function extractDepartment(text: string, departments: readonly Department[]): Department | null {
  const ordered = [...departments].sort(
    (a, b) => b.code.replace(/[\s-]/g, '').length - a.code.replace(/[\s-]/g, '').length
  );
  for (const dept of ordered) {
    if (!dept.code.trim()) continue;
    if (departmentPattern(dept.code).test(text)) return dept;
  }
  return null;
}

export const MIN_NAME_PART = 3;

/**
 * First faculty (catalog order) with a name part of MIN_NAME_PART or more
 * characters appearing in the text. Homonyms are not disambiguated.
 */
export function extractPerson(text: string, faculty: readonly Faculty[]): Faculty | null {
  for (const person of faculty) {
    const parts = normalizeText(person.name).split(/[\s-]+/).filter(p => p.length >= MIN_NAME_PART);
    if (parts.some(part => text.includes(part))) return person;
  }
  return null;
}

export interface ResolvedDay {
  day: DayName;
  /** Only known when the day is relative to today. */
  date: string | null;
}

const RELATIVE_DAY = /\b(today|todays|tonight|tomorrow|tmrw|tmr|yesterday)\b/;

/** True when the text pins a day, by name or relative to today. */
export function hasDayReference(text: string): boolean {
  return extractWeekday(text) !== null || RELATIVE_DAY.test(text);
}

export function resolveDay(query: Query, tz: string): ResolvedDay {
  const named = query.entities.weekday ?? extractWeekday(query.normalizedText);
  if (named) {
    return { day: named, date: named === query.dayName ? query.today : null };
  }
  if (/\b(tomorrow|tmrw|tmr)\b/.test(query.normalizedText)) {
    const date = addDays(query.today, 1, tz);
    return { day: getDayName(date, tz), date };
  }
  if (/\byesterday\b/.test(query.normalizedText)) {
    const date = addDays(query.today, -1, tz);
    return { day: getDayName(date, tz), date };
  }
  return { day: query.dayName, date: query.today };
}
