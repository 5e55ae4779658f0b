import type {
  DailyStatusFilter,
  DataStore,
  DayName,
  Department,
  Faculty,
  Intent,
  PeriodTiming,
  Query,
  ScheduleFilter
} from '../types/index.js';
import { hasDayReference, resolveDay, type ResolvedDay } from '../nlu/extractors.js';
import { enrichHistory, enrichSchedule, type ScheduleRow } from '../storage/loaders.js';
import { lastDateFor } from '../utils/time.js';
import {
  formatAbsentees,
  formatClassType,
  formatDaySchedule,
  formatDepartmentSchedule,
  formatFacultyDay,
  formatFacultyDetails,
  formatFacultyList,
  formatFacultyTopics,
  formatFacultyWeek,
  formatGreeting,
  formatHelp,
  formatInvalidNumber,
  formatLabProgram,
  formatMissingNumber,
  formatPeriodSchedule,
  formatSession,
  formatTeachingHistory,
  formatTodaySummary,
  formatTopicsToday,
  formatUnknownFaculty,
  type NumberKind
} from '../ux/responses.js';

export const HISTORY_LIMIT = 5;

export interface HandlerContext {
  query: Query;
  store: DataStore;
  faculty: readonly Faculty[];
  departments: readonly Department[];
  timezone: string;
  maxPeriod: number;
}

export type IntentHandler = (ctx: HandlerContext) => Promise<string>;

interface DayRows {
  rows: ScheduleRow[];
  timings: PeriodTiming[];
}

type SlotFilter = Omit<ScheduleFilter, 'day'>;

/** Schedule for one day, with the date's status entries attached when the date is known. */
async function loadDayRows(ctx: HandlerContext, resolved: ResolvedDay, filter: SlotFilter = {}): Promise<DayRows> {
  const statusFilter: DailyStatusFilter | null = resolved.date
    ? { date: resolved.date, facultyId: filter.facultyId, departmentCode: filter.departmentCode, period: filter.period }
    : null;

  const [facts, timings, statuses] = await Promise.all([
    ctx.store.scheduleFor({ ...filter, day: resolved.day }),
    ctx.store.periodTimings(),
    statusFilter ? ctx.store.dailyStatus(statusFilter) : Promise.resolve([])
  ]);

  const rows = enrichSchedule(facts, { faculty: ctx.faculty, departments: ctx.departments, timings }, statuses);
  return { rows, timings };
}

// Status questions need a date; a weekday other than today means its last occurrence
function datedDay(ctx: HandlerContext): { day: DayName; date: string } {
  const resolved = resolveDay(ctx.query, ctx.timezone);
  return { day: resolved.day, date: resolved.date ?? lastDateFor(resolved.day, ctx.query.today, ctx.timezone) };
}

function invalidNumber(kind: NumberKind, value: number, maxPeriod: number): string | null {
  const tooHigh = kind === 'period' && value > maxPeriod;
  return !Number.isSafeInteger(value) || value < 1 || tooHigh ? formatInvalidNumber(kind, value, maxPeriod) : null;
}

async function daySchedule(ctx: HandlerContext): Promise<string> {
  const resolved = resolveDay(ctx.query, ctx.timezone);
  const { rows } = await loadDayRows(ctx, resolved);
  return formatDaySchedule(resolved.day, rows);
}

async function facultyScheduleHandler(ctx: HandlerContext): Promise<string> {
  const faculty = ctx.query.entities.faculty;
  if (!faculty) return formatUnknownFaculty();

  if (hasDayReference(ctx.query.normalizedText)) {
    const resolved = resolveDay(ctx.query, ctx.timezone);
    const { rows } = await loadDayRows(ctx, resolved, { facultyId: faculty.id });
    return formatFacultyDay(faculty, resolved.day, rows);
  }

  const [facts, timings] = await Promise.all([
    ctx.store.weeklyScheduleFor(faculty.id),
    ctx.store.periodTimings()
  ]);
  const rows = enrichSchedule(facts, { faculty: ctx.faculty, departments: ctx.departments, timings });
  return formatFacultyWeek(faculty, rows);
}

async function facultyTopicHandler(ctx: HandlerContext): Promise<string> {
  const faculty = ctx.query.entities.faculty;
  if (!faculty) return formatUnknownFaculty();
  const { day, date } = datedDay(ctx);
  const statuses = await ctx.store.dailyStatus({ date, facultyId: faculty.id });
  return formatFacultyTopics(faculty, day, date, enrichHistory(statuses, ctx));
}

// contact details come from the store record, not the catalog snapshot
async function facultyDetailsHandler(ctx: HandlerContext): Promise<string> {
  const faculty = ctx.query.entities.faculty;
  if (!faculty) return formatUnknownFaculty();
  const record = await ctx.store.facultyById(faculty.id);
  return record ? formatFacultyDetails(record) : formatUnknownFaculty();
}

async function departmentScheduleHandler(ctx: HandlerContext): Promise<string> {
  const department = ctx.query.entities.department;
  if (!department) return daySchedule(ctx);
  const resolved = resolveDay(ctx.query, ctx.timezone);
  const { rows } = await loadDayRows(ctx, resolved, { departmentCode: department.code });
  return formatDepartmentSchedule(department, resolved.day, rows);
}

async function classTypeHandler(ctx: HandlerContext): Promise<string> {
  const classType = ctx.query.entities.classType;
  if (!classType) return daySchedule(ctx);
  const resolved = resolveDay(ctx.query, ctx.timezone);
  const { rows } = await loadDayRows(ctx, resolved, { classType });
  return formatClassType(classType, resolved.day, rows);
}

async function periodScheduleHandler(ctx: HandlerContext): Promise<string> {
  const period = ctx.query.entities.period;
  if (period === undefined) return formatMissingNumber('period');
  const invalid = invalidNumber('period', period, ctx.maxPeriod);
  if (invalid) return invalid;

  const resolved = resolveDay(ctx.query, ctx.timezone);
  const { rows, timings } = await loadDayRows(ctx, resolved, { period });
  const timing = timings.find(t => t.period === period) ?? null;
  return formatPeriodSchedule(period, resolved.day, timing, rows);
}

async function sessionPptHandler(ctx: HandlerContext): Promise<string> {
  const session = ctx.query.entities.session;
  if (session === undefined) return formatMissingNumber('session');
  const invalid = invalidNumber('session', session, ctx.maxPeriod);
  if (invalid) return invalid;
  return formatSession(session, await ctx.store.syllabusSession(session));
}

async function labProgramHandler(ctx: HandlerContext): Promise<string> {
  const lab = ctx.query.entities.lab;
  if (lab === undefined) return formatMissingNumber('lab');
  const invalid = invalidNumber('lab', lab, ctx.maxPeriod);
  if (invalid) return invalid;
  return formatLabProgram(lab, await ctx.store.labProgram(lab));
}

async function absenteesHandler(ctx: HandlerContext): Promise<string> {
  const { day, date } = datedDay(ctx);
  const { rows } = await loadDayRows(ctx, { day, date });
  return formatAbsentees(day, date, rows);
}

async function todaySummaryHandler(ctx: HandlerContext): Promise<string> {
  const { day, date } = datedDay(ctx);
  const { rows } = await loadDayRows(ctx, { day, date });
  return formatTodaySummary(day, date, rows);
}

async function topicsTodayHandler(ctx: HandlerContext): Promise<string> {
  const { day, date } = datedDay(ctx);
  const { rows } = await loadDayRows(ctx, { day, date });
  return formatTopicsToday(day, date, rows);
}

async function teachingHistoryHandler(ctx: HandlerContext): Promise<string> {
  const statuses = await ctx.store.recentDailyStatus(HISTORY_LIMIT);
  return formatTeachingHistory(enrichHistory(statuses, ctx));
}

export const HANDLERS: Record<Intent, IntentHandler> = {
  greeting: async () => formatGreeting(),
  help: async () => formatHelp(),
  faculty_topic: facultyTopicHandler,
  faculty_schedule: facultyScheduleHandler,
  faculty_details: facultyDetailsHandler,
  department_schedule: departmentScheduleHandler,
  class_type: classTypeHandler,
  period_schedule: periodScheduleHandler,
  weekday_schedule: daySchedule,
  session_ppt: sessionPptHandler,
  lab_program: labProgramHandler,
  absentees: absenteesHandler,
  today_summary: todaySummaryHandler,
  topics_today: topicsTodayHandler,
  teaching_history: teachingHistoryHandler,
  list_faculty: async (ctx) => formatFacultyList(ctx.faculty),
  today_schedule: daySchedule
};
