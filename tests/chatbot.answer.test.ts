/**
 * Test Suite: Chatbot Dispatch (end to end over in-memory data)
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { Chatbot, createChatbot } from '../src/features/chatbot.js';
import { HashingEncoder } from '../src/semantic/encoder.js';
import type { DataStore } from '../src/types/index.js';
import { formatGreeting, formatHelp } from '../src/ux/responses.js';
import { createStore, EXAMPLES, MONDAY, THURSDAY, WEDNESDAY } from './fixtures.js';

const CONFIG = { TIMEZONE: 'Asia/Kolkata', MAX_PERIOD: 9, FAQ_MIN_SCORE: 10, SEMANTIC_MAX_DISTANCE: 0.9 };

describe('Chatbot.answer', () => {
  let bot: Chatbot;

  beforeAll(async () => {
    bot = await createChatbot({ store: createStore(), encoder: new HashingEncoder(), examples: EXAMPLES, config: CONFIG });
  });

  it('should list everyone in a period with inline status', async () => {
    expect(await bot.answer('period 3', WEDNESDAY)).toBe([
      '**Period 3 (09:45-10:30) on Wednesday:**',
      '',
      '• **Priya Raman** - AIDS-A (Theory)',
      '• **Karthik Subramani** - CSE-A (Theory) [ABSENT: Medical leave]'
    ].join('\n'));
  });

  it('should say so when a period has no classes', async () => {
    expect(await bot.answer('Period 4', WEDNESDAY)).toBe('No classes in Period 4 on Wednesday.');
  });

  it('should show a department schedule for the day', async () => {
    expect(await bot.answer('AIDS-A', MONDAY)).toBe([
      '**AI and Data Science A (AIDS-A) - Monday:**',
      '',
      '• Period 1 (08:00-08:45) - Priya Raman (Theory) [SWAPPED with Harish Velu]'
    ].join('\n'));
  });

  it('should group lab classes by period', async () => {
    expect(await bot.answer('lab today', THURSDAY)).toBe([
      '**Lab classes on Thursday:**',
      '',
      '**Period 2 (08:45-09:30)**',
      '  • Priya Raman - AIDS-A',
      '',
      '_Total: 1 class_'
    ].join('\n'));
  });

  it('should not claim everyone is present before entries are filled', async () => {
    expect(await bot.answer('who is absent today', THURSDAY)).toBe(
      'No daily entries filled yet for Thursday (2026-10-22), so absences cannot be confirmed.'
    );
  });

  it('should list absentees once entries exist', async () => {
    expect(await bot.answer('Hey, who is absent today?', WEDNESDAY)).toBe([
      '**Absent on Wednesday (2026-10-21):**',
      '',
      '• **Karthik Subramani** - Period 3 (CSE-A) [ABSENT: Medical leave]',
      '',
      '_2 of 4 scheduled classes filled._'
    ].join('\n'));
  });

  it('should summarise the day', async () => {
    expect(await bot.answer('summary', WEDNESDAY)).toBe([
      '**Summary for Wednesday (2026-10-21):**',
      '',
      '• Scheduled: 4',
      '• Filled: 2',
      '• Pending: 2',
      '• Absent: 1',
      '• Swapped: 0'
    ].join('\n'));
  });

  it('should return the PPT link or say it is not available', async () => {
    expect(await bot.answer('session 5 ppt', WEDNESDAY)).toBe([
      '**Session 5:**',
      '',
      '**Topic:** Decision Making',
      '**Unit:** 2',
      '**Subtopics:** if, switch',
      '**PPT Link:** https://lms.example.edu/session-5.pptx'
    ].join('\n'));
    expect((await bot.answer('session 6 ppt', WEDNESDAY)).split('\n').at(-1)).toBe('**PPT Link:** Not available yet');
  });

  it('should prefer a named faculty over the generic schedule handler', async () => {
    expect(await bot.answer('priya schedule', WEDNESDAY)).toBe([
      '**Schedule for Priya Raman:**',
      '',
      '**Monday:** P1 (AIDS-A)',
      '**Wednesday:** P3 (AIDS-A)',
      '**Thursday:** P2 (AIDS-A)'
    ].join('\n'));
    expect(await bot.answer('priya schedule today', WEDNESDAY)).toBe([
      '**Priya Raman - Wednesday:**',
      '',
      '• Period 3 (09:45-10:30) - AIDS-A (Theory)'
    ].join('\n'));
  });

  it('should report what a faculty member taught', async () => {
    expect(await bot.answer('what did priya teach today', WEDNESDAY)).toBe([
      '**Topics taught by Priya Raman on Wednesday (2026-10-21):**',
      '',
      '• Period 3 (AIDS-A): Operators and Expressions [Session 4]'
    ].join('\n'));
  });

  it('should answer the question after a greeting', async () => {
    expect(await bot.answer('hi period 3', WEDNESDAY)).toBe(await bot.answer('period 3', WEDNESDAY));
    expect(await bot.answer('is it a lab day today', THURSDAY)).toBe(await bot.answer('lab today', THURSDAY));
  });

  it('should validate numbers', async () => {
    expect(await bot.answer('period 12', WEDNESDAY)).toBe('Period 12 is not valid. Periods run from 1 to 9.');
    expect(await bot.answer('period 99999999999999999999', WEDNESDAY)).toBe(
      'That period number is not valid. Periods run from 1 to 9.'
    );
    expect(await bot.answer('session 99999999999999999999', WEDNESDAY)).toBe(
      'That session number is not valid. Session numbers start at 1.'
    );
    expect(await bot.answer('week 0 lab', WEDNESDAY)).toBe('Week 0 is not valid. Lab weeks start at 1.');
  });

  it('should answer from the FAQ catalog', async () => {
    expect(await bot.answer('What is a pointer in C?', WEDNESDAY)).toBe(
      '**What is a pointer in C?**\n\nA pointer stores the memory address of another variable.'
    );
  });

  it('should fall back to the nearest example phrase', async () => {
    expect(await bot.answer('faculty members', WEDNESDAY)).toBe([
      '**All faculty (4):**',
      '',
      '1. **Priya Raman** - AIDS-A',
      '   priya@example.edu | 000-000-0001',
      '2. **Karthik Subramani** - CSE-A',
      '   karthik@example.edu | 000-000-0002',
      '3. **Meena Lakshmi** - IT-A',
      '   meena@example.edu | 000-000-0003',
      '4. **Harish Velu** - RA',
      '   harish@example.edu | 000-000-0004'
    ].join('\n'));
  });

  it('should show contact details for a named faculty member', async () => {
    expect(await bot.answer('Priya contact details', WEDNESDAY)).toBe([
      '**Faculty details for Priya Raman:**',
      '',
      '**Department:** AIDS-A',
      '**Email:** priya@example.edu',
      '**Phone:** 000-000-0001',
      '**Experience:** 8 years'
    ].join('\n'));
  });

  it('should ask for a number when the nearest example needs one', async () => {
    expect(await bot.answer('lab exercise details', WEDNESDAY)).toBe('Please specify a week number, for example "week 3 lab".');
  });

  it('should greet and help', async () => {
    expect(await bot.answer('hello', WEDNESDAY)).toBe(formatGreeting());
    expect(await bot.answer('?', WEDNESDAY)).toBe(formatHelp());
  });

  it('should name today in the default reply', async () => {
    const text = await bot.answer('xyzzy plugh', WEDNESDAY);
    expect(text.split('\n')[0]).toBe("I'm not sure I understood that question. Today is Wednesday.");
  });

  it('should accept a Date for today', async () => {
    expect(await bot.answer('Period 4', new Date('2026-10-21T06:00:00Z'))).toBe('No classes in Period 4 on Wednesday.');
  });
});

describe('Chatbot store failures', () => {
  it('should reject with the store error', async () => {
    const healthy = createStore();
    const failure = new Error('store unreachable');
    const broken: DataStore = {
      scheduleFor: (filter) => healthy.scheduleFor(filter),
      weeklyScheduleFor: (id) => healthy.weeklyScheduleFor(id),
      facultyById: (id) => healthy.facultyById(id),
      allActiveFaculty: () => healthy.allActiveFaculty(),
      departments: () => healthy.departments(),
      dailyStatus: () => Promise.reject(failure),
      recentDailyStatus: (limit) => healthy.recentDailyStatus(limit),
      syllabusSession: (n) => healthy.syllabusSession(n),
      labProgram: (n) => healthy.labProgram(n),
      periodTimings: () => healthy.periodTimings(),
      faqCatalog: () => healthy.faqCatalog()
    };
    const bot = await createChatbot({ store: broken, encoder: new HashingEncoder(), examples: EXAMPLES, config: CONFIG });

    await expect(bot.answer('who is absent today', WEDNESDAY)).rejects.toBe(failure);
    expect(await bot.answer('session 6 ppt', WEDNESDAY)).toContain('Not available yet');
  });
});
