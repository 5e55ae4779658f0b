import type {
  ClassType,
  DayName,
  Department,
  FAQEntry,
  Faculty,
  LabProgram,
  PeriodTiming,
  SyllabusSession
} from '../types/index.js';
import { groupByDay, groupByPeriod, type HistoryRow, type ScheduleRow } from '../storage/loaders.js';
import { classTypeLabel, lines, md, periodLabel, plural, statusNote } from './format.js';

// "Wednesday (2026-10-21)" when the date is known
function dayLabel(day: DayName, date: string | null): string {
  return date ? `${day} (${date})` : day;
}

function periodBlocks(rows: readonly ScheduleRow[], line: (row: ScheduleRow) => string): string[] {
  const out: string[] = [];
  for (const [period, group] of groupByPeriod(rows)) {
    out.push(md.b(periodLabel(period, group[0]?.timing ?? null)));
    for (const row of group) out.push(`  ${md.li(line(row))}`);
  }
  return out;
}

function distinctFaculty(rows: readonly ScheduleRow[]): number {
  return new Set(rows.map(r => r.facultyId)).size;
}

export function formatPeriodSchedule(
  period: number,
  day: DayName,
  timing: PeriodTiming | null,
  rows: readonly ScheduleRow[]
): string {
  if (rows.length === 0) return `No classes in Period ${period} on ${day}.`;
  return lines(
    md.b(`${periodLabel(period, timing)} on ${day}:`),
    '',
    ...groupByPeriod(rows).flatMap(([, group]) =>
      group.map(r => md.li(`${md.b(r.facultyName)} - ${r.departmentCode} (${classTypeLabel(r.classType)})${statusNote(r.status)}`))
    )
  );
}

export function formatDepartmentSchedule(department: Department, day: DayName, rows: readonly ScheduleRow[]): string {
  if (rows.length === 0) return `No classes for ${department.code} on ${day}.`;
  return lines(
    md.b(`${department.name} (${department.code}) - ${day}:`),
    '',
    ...groupByPeriod(rows).flatMap(([, group]) =>
      group.map(r => md.li(`${periodLabel(r.period, r.timing)} - ${r.facultyName} (${classTypeLabel(r.classType)})${statusNote(r.status)}`))
    )
  );
}

export function formatClassType(classType: ClassType, day: DayName, rows: readonly ScheduleRow[]): string {
  const label = classTypeLabel(classType);
  if (rows.length === 0) return `No ${label} classes on ${day}.`;
  return lines(
    md.b(`${label} classes on ${day}:`),
    '',
    ...periodBlocks(rows, r => `${r.facultyName} - ${r.departmentCode}${statusNote(r.status)}`),
    '',
    md.i(`Total: ${plural(rows.length, 'class', 'classes')}`)
  );
}

export function formatDaySchedule(day: DayName, rows: readonly ScheduleRow[]): string {
  if (rows.length === 0) return `No classes scheduled for ${day}.`;
  return lines(
    md.b(`Complete schedule for ${day}:`),
    '',
    ...periodBlocks(rows, r => `${r.facultyName} - ${r.departmentCode} (${classTypeLabel(r.classType)})${statusNote(r.status)}`),
    '',
    md.i(`Total: ${plural(rows.length, 'class', 'classes')}, ${plural(distinctFaculty(rows), 'faculty member')}`)
  );
}

export function formatFacultyWeek(faculty: Faculty, rows: readonly ScheduleRow[]): string {
  if (rows.length === 0) return `${md.b(faculty.name)} has no scheduled classes.`;
  return lines(
    md.b(`Schedule for ${faculty.name}:`),
    '',
    ...groupByDay(rows).map(([day, group]) =>
      md.kv(day, group.map(r => `P${r.period} (${r.departmentCode})`).join(', '))
    )
  );
}

export function formatFacultyDay(faculty: Faculty, day: DayName, rows: readonly ScheduleRow[]): string {
  if (rows.length === 0) return `${md.b(faculty.name)} has no classes on ${day}.`;
  return lines(
    md.b(`${faculty.name} - ${day}:`),
    '',
    ...groupByPeriod(rows).flatMap(([, group]) =>
      group.map(r => md.li(`${periodLabel(r.period, r.timing)} - ${r.departmentCode} (${classTypeLabel(r.classType)})${statusNote(r.status)}`))
    )
  );
}

function topicText(row: Pick<HistoryRow, 'topic' | 'topicRef'>): string {
  if (row.topic) return row.topicRef !== null ? `${row.topic} [Session ${row.topicRef}]` : row.topic;
  return row.topicRef !== null ? `Session ${row.topicRef}` : 'Topic not filled';
}

export function formatFacultyTopics(
  faculty: Faculty,
  day: DayName,
  date: string | null,
  entries: readonly HistoryRow[]
): string {
  if (entries.length === 0) return `No topics recorded for ${faculty.name} on ${dayLabel(day, date)}.`;
  const sorted = [...entries].sort((a, b) => a.period - b.period || a.departmentCode.localeCompare(b.departmentCode));
  return lines(
    md.b(`Topics taught by ${faculty.name} on ${dayLabel(day, date)}:`),
    '',
    ...sorted.map(e => md.li(`Period ${e.period} (${e.departmentCode}): ${topicText(e)}${statusNote(e)}`))
  );
}

function filledCount(rows: readonly ScheduleRow[]): number {
  return rows.filter(r => r.status !== null).length;
}

/**
 * Absence needs a filled entry: an empty day reads as "not filled yet",
 * never as "everyone present".
 */
export function formatAbsentees(day: DayName, date: string, rows: readonly ScheduleRow[]): string {
  const when = dayLabel(day, date);
  if (rows.length === 0) return `No classes scheduled for ${when}, so there are no absences to track.`;
  const filled = filledCount(rows);
  if (filled === 0) return `No daily entries filled yet for ${when}, so absences cannot be confirmed.`;

  const progress = `${filled} of ${plural(rows.length, 'scheduled class', 'scheduled classes')} filled.`;
  const absent = rows.filter(r => r.status?.isAbsent);
  if (absent.length === 0) return `No absences recorded for ${when}. ${progress}`;

  return lines(
    md.b(`Absent on ${when}:`),
    '',
    ...groupByPeriod(absent).flatMap(([, group]) =>
      group.map(r => md.li(`${md.b(r.facultyName)} - Period ${r.period} (${r.departmentCode})${statusNote(r.status)}`))
    ),
    '',
    md.i(progress)
  );
}

export function formatTodaySummary(day: DayName, date: string, rows: readonly ScheduleRow[]): string {
  const when = dayLabel(day, date);
  if (rows.length === 0) return `No classes scheduled for ${when}.`;
  const filled = filledCount(rows);
  return lines(
    md.b(`Summary for ${when}:`),
    '',
    md.li(`Scheduled: ${rows.length}`),
    md.li(`Filled: ${filled}`),
    md.li(`Pending: ${rows.length - filled}`),
    md.li(`Absent: ${rows.filter(r => r.status?.isAbsent).length}`),
    md.li(`Swapped: ${rows.filter(r => r.status?.isSwapped).length}`)
  );
}

export function formatTopicsToday(day: DayName, date: string, rows: readonly ScheduleRow[]): string {
  const when = dayLabel(day, date);
  if (rows.length === 0) return `No classes scheduled for ${when}.`;
  const filled = rows.filter(r => r.status !== null);
  if (filled.length === 0) return `No daily entries filled yet for ${when}.`;
  return lines(
    md.b(`Topics covered on ${when}:`),
    '',
    ...groupByPeriod(filled).flatMap(([, group]) =>
      group.map(r => {
        const topic = r.status && !r.status.isAbsent ? topicText(r.status) : 'No class held';
        return md.li(`Period ${r.period} - ${r.facultyName} (${r.departmentCode}): ${topic}${statusNote(r.status)}`);
      })
    ),
    '',
    md.i(`${filled.length} of ${rows.length} entries filled`)
  );
}

export function formatTeachingHistory(entries: readonly HistoryRow[]): string {
  if (entries.length === 0) return 'No recent teaching records found.';
  return lines(
    md.b('Recent teaching entries:'),
    '',
    ...entries.flatMap(e => [
      md.li(`${md.b(e.date)} - ${e.facultyName} (${e.departmentCode}), Period ${e.period}: ${topicText(e)}${statusNote(e)}`),
      e.summary ? `  Summary: ${e.summary}` : null
    ])
  );
}

export function formatFacultyList(faculty: readonly Faculty[]): string {
  if (faculty.length === 0) return 'No faculty found.';
  return lines(
    md.b(`All faculty (${faculty.length}):`),
    '',
    ...faculty.flatMap((f, i) => [
      `${i + 1}. ${md.b(f.name)} - ${f.departmentCode ?? 'N/A'}`,
      `   ${f.email} | ${f.phone}`
    ])
  );
}

export function formatFacultyDetails(faculty: Faculty): string {
  return lines(
    md.b(`Faculty details for ${faculty.name}:`),
    '',
    md.kv('Department', faculty.departmentCode ?? 'N/A'),
    md.kv('Email', faculty.email),
    md.kv('Phone', faculty.phone),
    faculty.experience ? md.kv('Experience', `${faculty.experience} years`) : null,
    faculty.researchArea ? md.kv('Research Area', faculty.researchArea) : null
  );
}

export function formatSession(number: number, session: SyllabusSession | null): string {
  if (!session) return `No session ${number} found in the syllabus.`;
  return lines(
    md.b(`Session ${number}:`),
    '',
    md.kv('Topic', session.title),
    md.kv('Unit', String(session.unit)),
    session.topics ? md.kv('Subtopics', session.topics) : null,
    md.kv('PPT Link', session.pptUrl ?? 'Not available yet')
  );
}

export function formatLabProgram(number: number, program: LabProgram | null): string {
  if (!program) return `No lab program found for week ${number}.`;
  return lines(
    md.b(`Lab Program - Week ${number}:`),
    '',
    md.kv('Title', program.title),
    program.description ? md.kv('Description', program.description) : null,
    md.kv('Moodle Link', program.moodleUrl ?? 'Not available yet')
  );
}

export function formatFaq(entry: FAQEntry): string {
  return lines(md.b(entry.question), '', entry.answer);
}

export function formatGreeting(): string {
  return lines(
    md.b('Hello! Welcome to the campus schedule assistant.'),
    '',
    'I can help you with:',
    md.li('Class schedules by day, period, department or faculty'),
    md.li('Absentees and daily teaching status'),
    md.li('Lab programs and session materials'),
    '',
    `Type ${md.b('help')} to see example questions.`
  );
}

export function formatHelp(): string {
  return lines(
    md.b('Campus Schedule Assistant - Help'),
    '',
    md.b('Schedule:'),
    md.li('"Today\'s schedule"'),
    md.li('"Period 3"'),
    md.li('"AIDS-A schedule on Monday"'),
    md.li('"Who has lab today?"'),
    '',
    md.b('Lab Programs:'),
    md.li('"Lab program week 3"'),
    '',
    md.b('Session Materials:'),
    md.li('"Session 5 PPT"'),
    '',
    md.b('Faculty Information:'),
    md.li('"List all faculty"'),
    md.li('"Priya contact details"'),
    md.li('"Who is absent today?"'),
    '',
    md.b('Teaching History:'),
    md.li('"Topics covered today"'),
    md.li('"What was taught recently?"')
  );
}

export function formatUnknown(today: DayName): string {
  return lines(
    `I'm not sure I understood that question. Today is ${today}.`,
    '',
    'Try asking about:',
    md.li('"Today\'s schedule"'),
    md.li('"Period 2 on Tuesday"'),
    md.li('"Week 3 lab"'),
    md.li('"Session 5 PPT"'),
    '',
    `Or type ${md.b('help')} for more options.`
  );
}

export type NumberKind = 'period' | 'session' | 'lab';

// digits past the safe integer range have no exact value to echo back
function numberLabel(noun: string, value: number): string {
  return Number.isSafeInteger(value) ? `${noun} ${value}` : `That ${noun.toLowerCase()} number`;
}

export function formatInvalidNumber(kind: NumberKind, value: number, maxPeriod: number): string {
  switch (kind) {
    case 'period':
      return `${numberLabel('Period', value)} is not valid. Periods run from 1 to ${maxPeriod}.`;
    case 'session':
      return `${numberLabel('Session', value)} is not valid. Session numbers start at 1.`;
    case 'lab':
      return `${numberLabel('Week', value)} is not valid. Lab weeks start at 1.`;
  }
}

export function formatMissingNumber(kind: NumberKind): string {
  switch (kind) {
    case 'period':
      return 'Please specify a period number, for example "period 3".';
    case 'session':
      return 'Please specify a session number, for example "session 5 ppt".';
    case 'lab':
      return 'Please specify a week number, for example "week 3 lab".';
  }
}

export function formatUnknownFaculty(): string {
  return 'I couldn\'t find that faculty member. Try "list all faculty" to see every name.';
}
