/**
 * Test Suite: Response Formatters
 */

import { describe, it, expect } from 'vitest';
import type { DailyStatus, Faculty } from '../src/types/index.js';
import type { HistoryRow, ScheduleRow } from '../src/storage/loaders.js';
import { periodLabel, statusNote } from '../src/ux/format.js';
import {
  formatAbsentees,
  formatClassType,
  formatDaySchedule,
  formatFacultyDetails,
  formatFacultyList,
  formatFacultyWeek,
  formatInvalidNumber,
  formatLabProgram,
  formatMissingNumber,
  formatPeriodSchedule,
  formatSession,
  formatTeachingHistory,
  formatTodaySummary,
  formatTopicsToday
} from '../src/ux/responses.js';
import { FACULTY, WEDNESDAY } from './fixtures.js';

function status(overrides: Partial<DailyStatus> = {}): DailyStatus {
  return {
    facultyId: 1,
    departmentCode: 'AIDS-A',
    date: WEDNESDAY,
    period: 1,
    isAbsent: false,
    absentReason: null,
    isSwapped: false,
    swappedWith: null,
    swapReason: null,
    topicRef: null,
    topic: null,
    summary: null,
    ...overrides
  };
}

function row(overrides: Partial<ScheduleRow> = {}): ScheduleRow {
  return {
    facultyId: 1,
    departmentCode: 'AIDS-A',
    day: 'Wednesday',
    period: 1,
    classType: 'theory',
    facultyName: 'Priya Raman',
    departmentName: 'AI and Data Science A',
    timing: null,
    status: null,
    ...overrides
  };
}

const PRIYA: Faculty = {
  id: 1,
  name: 'Priya Raman',
  email: 'priya@example.edu',
  phone: '000-000-0001',
  departmentCode: 'AIDS-A',
  experience: null,
  researchArea: null,
  active: true
};

describe('empty results', () => {
  it('should name what was asked for', () => {
    expect(formatPeriodSchedule(3, 'Wednesday', null, [])).toBe('No classes in Period 3 on Wednesday.');
    expect(formatClassType('mini-project', 'Friday', [])).toBe('No Mini Project classes on Friday.');
    expect(formatDaySchedule('Sunday', [])).toBe('No classes scheduled for Sunday.');
    expect(formatFacultyWeek(PRIYA, [])).toBe('**Priya Raman** has no scheduled classes.');
    expect(formatTeachingHistory([])).toBe('No recent teaching records found.');
    expect(formatFacultyList([])).toBe('No faculty found.');
    expect(formatSession(9, null)).toBe('No session 9 found in the syllabus.');
    expect(formatLabProgram(12, null)).toBe('No lab program found for week 12.');
  });

  it('should never report everyone present when nothing is filled', () => {
    const rows = [row(), row({ facultyId: 2, facultyName: 'Karthik Subramani', period: 2 })];
    expect(formatAbsentees('Wednesday', WEDNESDAY, rows)).toBe(
      'No daily entries filled yet for Wednesday (2026-10-21), so absences cannot be confirmed.'
    );
    expect(formatTopicsToday('Wednesday', WEDNESDAY, rows)).toBe('No daily entries filled yet for Wednesday (2026-10-21).');
  });
});

describe('statusNote', () => {
  it('should describe absence and swaps inline', () => {
    expect(statusNote(null)).toBe('');
    expect(statusNote(status())).toBe('');
    expect(statusNote(status({ isAbsent: true }))).toBe(' [ABSENT]');
    expect(statusNote(status({ isSwapped: true, swappedWith: 'Harish Velu', swapReason: 'Department meeting' }))).toBe(
      ' [SWAPPED with Harish Velu: Department meeting]'
    );
    expect(statusNote(status({ isAbsent: true, absentReason: 'Fever', isSwapped: true }))).toBe(
      ' [ABSENT: Fever; SWAPPED with another faculty]'
    );
  });
});

describe('periodLabel', () => {
  it('should use the timing label with its clock times', () => {
    expect(periodLabel(5, { period: 5, start: '12:00', end: '12:45', label: 'Lunch Period' })).toBe('Lunch Period (12:00-12:45)');
    expect(periodLabel(7, null)).toBe('Period 7');
  });
});

describe('schedules', () => {
  it('should group class types by period in ascending order', () => {
    const rows = [
      row({ period: 6, facultyName: 'Harish Velu', departmentCode: 'RA', classType: 'lab' }),
      row({ period: 1, facultyName: 'Meena Lakshmi', departmentCode: 'IT-A', classType: 'lab', timing: { period: 1, start: '08:00', end: '08:45', label: 'Period 1' } })
    ];
    expect(formatClassType('lab', 'Wednesday', rows)).toBe([
      '**Lab classes on Wednesday:**',
      '',
      '**Period 1 (08:00-08:45)**',
      '  • Meena Lakshmi - IT-A',
      '**Period 6**',
      '  • Harish Velu - RA',
      '',
      '_Total: 2 classes_'
    ].join('\n'));
  });

  it('should order a weekly view Monday first', () => {
    const rows = [
      row({ day: 'Thursday', period: 2 }),
      row({ day: 'Monday', period: 4, departmentCode: 'AIDS-B' }),
      row({ day: 'Monday', period: 1 })
    ];
    expect(formatFacultyWeek(PRIYA, rows)).toBe([
      '**Schedule for Priya Raman:**',
      '',
      '**Monday:** P1 (AIDS-A), P4 (AIDS-B)',
      '**Thursday:** P2 (AIDS-A)'
    ].join('\n'));
  });

  it('should count classes and distinct faculty for a day', () => {
    const rows = [row(), row({ period: 2 }), row({ facultyId: 2, facultyName: 'Karthik Subramani', departmentCode: 'CSE-A', period: 2 })];
    const text = formatDaySchedule('Wednesday', rows);
    expect(text.split('\n').at(-1)).toBe('_Total: 3 classes, 2 faculty members_');
  });

  it('should be byte-identical across calls', () => {
    const rows = [row({ period: 3 }), row({ period: 1, status: status({ isAbsent: true }) })];
    expect(formatDaySchedule('Wednesday', rows)).toBe(formatDaySchedule('Wednesday', [...rows].reverse()));
  });
});

describe('daily status views', () => {
  const rows = [
    row({ period: 1, status: status({ topic: 'Arrays', topicRef: 7 }) }),
    row({ period: 2, facultyId: 2, facultyName: 'Karthik Subramani', departmentCode: 'CSE-A', status: status({ facultyId: 2, isAbsent: true }) }),
    row({ period: 3, facultyId: 3, facultyName: 'Meena Lakshmi', departmentCode: 'IT-A' })
  ];

  it('should list absentees with progress', () => {
    expect(formatAbsentees('Wednesday', WEDNESDAY, rows)).toBe([
      '**Absent on Wednesday (2026-10-21):**',
      '',
      '• **Karthik Subramani** - Period 2 (CSE-A) [ABSENT]',
      '',
      '_2 of 3 scheduled classes filled._'
    ].join('\n'));
  });

  it('should summarise the day', () => {
    expect(formatTodaySummary('Wednesday', WEDNESDAY, rows)).toBe([
      '**Summary for Wednesday (2026-10-21):**',
      '',
      '• Scheduled: 3',
      '• Filled: 2',
      '• Pending: 1',
      '• Absent: 1',
      '• Swapped: 0'
    ].join('\n'));
  });

  it('should list covered topics', () => {
    expect(formatTopicsToday('Wednesday', WEDNESDAY, rows)).toBe([
      '**Topics covered on Wednesday (2026-10-21):**',
      '',
      '• Period 1 - Priya Raman (AIDS-A): Arrays [Session 7]',
      '• Period 2 - Karthik Subramani (CSE-A): No class held [ABSENT]',
      '',
      '_2 of 3 entries filled_'
    ].join('\n'));
  });
});

describe('formatTeachingHistory', () => {
  function historyRow(overrides: Partial<DailyStatus>, facultyName: string): HistoryRow {
    return { ...status(overrides), facultyName, departmentName: 'unused' };
  }

  it('should print the summary under entries that have one', () => {
    const entries = [
      historyRow({ period: 3, topic: 'Arrays', topicRef: 7, summary: 'Declared and traversed arrays' }, 'Priya Raman'),
      historyRow({ facultyId: 2, departmentCode: 'CSE-A', isAbsent: true }, 'Karthik Subramani')
    ];
    expect(formatTeachingHistory(entries)).toBe([
      '**Recent teaching entries:**',
      '',
      '• **2026-10-21** - Priya Raman (AIDS-A), Period 3: Arrays [Session 7]',
      '  Summary: Declared and traversed arrays',
      '• **2026-10-21** - Karthik Subramani (CSE-A), Period 1: Topic not filled [ABSENT]'
    ].join('\n'));
  });
});

describe('materials and validation', () => {
  it('should show a session with a missing PPT as not available yet', () => {
    expect(formatSession(6, { number: 6, title: 'Loops', unit: 2, topics: '', pptUrl: null })).toBe([
      '**Session 6:**',
      '',
      '**Topic:** Loops',
      '**Unit:** 2',
      '**PPT Link:** Not available yet'
    ].join('\n'));
  });

  it('should show a lab program with its link', () => {
    expect(formatLabProgram(3, { number: 3, title: 'Largest of Three', description: 'Nested if', moodleUrl: 'https://lms.example.edu/lab-3' })).toBe([
      '**Lab Program - Week 3:**',
      '',
      '**Title:** Largest of Three',
      '**Description:** Nested if',
      '**Moodle Link:** https://lms.example.edu/lab-3'
    ].join('\n'));
  });

  it('should explain invalid and missing numbers', () => {
    expect(formatInvalidNumber('period', 12, 9)).toBe('Period 12 is not valid. Periods run from 1 to 9.');
    expect(formatInvalidNumber('session', 0, 9)).toBe('Session 0 is not valid. Session numbers start at 1.');
    expect(formatMissingNumber('lab')).toBe('Please specify a week number, for example "week 3 lab".');
  });

  it('should number the faculty list in catalog order', () => {
    expect(formatFacultyList(FACULTY.slice(0, 2))).toBe([
      '**All faculty (2):**',
      '',
      '1. **Priya Raman** - AIDS-A',
      '   priya@example.edu | 000-000-0001',
      '2. **Karthik Subramani** - CSE-A',
      '   karthik@example.edu | 000-000-0002'
    ].join('\n'));
  });

  it('should show only the profile fields that are filled', () => {
    expect(formatFacultyDetails({ ...PRIYA, experience: null, researchArea: 'Machine Learning' })).toBe([
      '**Faculty details for Priya Raman:**',
      '',
      '**Department:** AIDS-A',
      '**Email:** priya@example.edu',
      '**Phone:** 000-000-0001',
      '**Research Area:** Machine Learning'
    ].join('\n'));
  });

  it('should say that an oversized number is not valid without echoing it', () => {
    expect(formatInvalidNumber('lab', Number.POSITIVE_INFINITY, 9)).toBe('That week number is not valid. Lab weeks start at 1.');
  });
});
