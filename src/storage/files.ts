import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { BotError, type IntentExample } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DataSnapshotSchema, IntentExampleSchema, type DataSnapshot } from './schemas.js';

export const DATA_FILES = {
  departments: 'departments.json',
  faculty: 'faculty.json',
  timetable: 'timetable.json',
  dailyEntries: 'daily_entries.json',
  syllabus: 'syllabus.json',
  labPrograms: 'lab_programs.json',
  periodTimings: 'period_timings.json',
  faqs: 'faqs.json'
} as const;

export const INTENT_EXAMPLES_FILE = 'intent_examples.json';

// Missing file -> defaultValue; unreadable or malformed file -> BotError
async function loadJsonFile(dataDir: string, filename: string, defaultValue: unknown): Promise<unknown> {
  const filepath = join(dataDir, filename);
  if (!existsSync(filepath)) {
    logger.warn({ filepath }, 'Data file missing, using default');
    return defaultValue;
  }

  try {
    const content = await readFile(filepath, 'utf8');
    return JSON.parse(content);
  } catch (error) {
    logger.error({ err: error, filename }, 'Error loading JSON file');
    throw new BotError(`Cannot load ${filepath}: ${error instanceof Error ? error.message : String(error)}`, 'DATA_INVALID');
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

/** Reads every data file in `dataDir` into one validated snapshot. */
export async function loadSnapshot(dataDir: string): Promise<DataSnapshot> {
  const raw: Record<string, unknown> = {};
  for (const [key, filename] of Object.entries(DATA_FILES)) {
    raw[key] = await loadJsonFile(dataDir, filename, []);
  }

  const parsed = DataSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BotError(`Invalid data in ${dataDir}: ${describeIssues(parsed.error)}`, 'DATA_INVALID');
  }

  logger.info({
    dataDir,
    departments: parsed.data.departments.length,
    faculty: parsed.data.faculty.length,
    timetable: parsed.data.timetable.length,
    dailyEntries: parsed.data.dailyEntries.length,
    faqs: parsed.data.faqs.length
  }, 'All data loaded successfully');
  return parsed.data;
}

export async function loadIntentExamples(dataDir: string): Promise<IntentExample[]> {
  const raw = await loadJsonFile(dataDir, INTENT_EXAMPLES_FILE, []);
  const parsed = z.array(IntentExampleSchema).safeParse(raw);
  if (!parsed.success) {
    throw new BotError(`Invalid ${INTENT_EXAMPLES_FILE}: ${describeIssues(parsed.error)}`, 'DATA_INVALID');
  }
  return parsed.data;
}
