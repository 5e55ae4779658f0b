import type {
  DailyStatus,
  DayName,
  Department,
  Faculty,
  PeriodTiming,
  ScheduleFact
} from '../types/index.js';
import { weekdayOrder } from '../utils/time.js';

export interface Catalogs {
  faculty: readonly Faculty[];
  departments: readonly Department[];
  timings: readonly PeriodTiming[];
}

/** A timetable slot joined with names, clock times and the day's status entry. */
export type ScheduleRow = ScheduleFact & {
  facultyName: string;
  departmentName: string;
  timing: PeriodTiming | null;
  status: DailyStatus | null;
};

export type HistoryRow = DailyStatus & {
  facultyName: string;
  departmentName: string;
};

function facultyName(byId: Map<number, Faculty>, id: number): string {
  return byId.get(id)?.name ?? `Faculty #${id}`;
}

function departmentName(byCode: Map<string, Department>, code: string): string {
  return byCode.get(code)?.name ?? code;
}

function slotKey(facultyId: number, departmentCode: string, period: number): string {
  return `${facultyId}|${departmentCode}|${period}`;
}

export function compareRows(a: ScheduleRow, b: ScheduleRow): number {
  return weekdayOrder(a.day) - weekdayOrder(b.day)
    || a.period - b.period
    || a.departmentCode.localeCompare(b.departmentCode)
    || a.facultyName.localeCompare(b.facultyName);
}

/**
 * Joins schedule facts with the catalogs. `statuses` must all belong to one
 * date; each is attached to the slot with the same faculty, department and period.
 */
export function enrichSchedule(
  facts: readonly ScheduleFact[],
  catalogs: Catalogs,
  statuses: readonly DailyStatus[] = []
): ScheduleRow[] {
  const byId = new Map(catalogs.faculty.map(f => [f.id, f]));
  const byCode = new Map(catalogs.departments.map(d => [d.code, d]));
  const byPeriod = new Map(catalogs.timings.map(t => [t.period, t]));
  const bySlot = new Map(statuses.map(s => [slotKey(s.facultyId, s.departmentCode, s.period), s]));

  return facts
    .map(fact => ({
      ...fact,
      facultyName: facultyName(byId, fact.facultyId),
      departmentName: departmentName(byCode, fact.departmentCode),
      timing: byPeriod.get(fact.period) ?? null,
      status: bySlot.get(slotKey(fact.facultyId, fact.departmentCode, fact.period)) ?? null
    }))
    .sort(compareRows);
}

/** Names for daily entries; keeps the order the store returned. */
export function enrichHistory(statuses: readonly DailyStatus[], catalogs: Pick<Catalogs, 'faculty' | 'departments'>): HistoryRow[] {
  const byId = new Map(catalogs.faculty.map(f => [f.id, f]));
  const byCode = new Map(catalogs.departments.map(d => [d.code, d]));
  return statuses.map(status => ({
    ...status,
    facultyName: facultyName(byId, status.facultyId),
    departmentName: departmentName(byCode, status.departmentCode)
  }));
}

/** Rows grouped by day, in Monday..Sunday order. */
export function groupByDay(rows: readonly ScheduleRow[]): Array<[DayName, ScheduleRow[]]> {
  const groups = new Map<DayName, ScheduleRow[]>();
  for (const row of [...rows].sort(compareRows)) {
    const list = groups.get(row.day) ?? [];
    list.push(row);
    groups.set(row.day, list);
  }
  return [...groups.entries()];
}

/** Rows grouped by period, ascending. */
export function groupByPeriod(rows: readonly ScheduleRow[]): Array<[number, ScheduleRow[]]> {
  const groups = new Map<number, ScheduleRow[]>();
  for (const row of [...rows].sort(compareRows)) {
    const list = groups.get(row.period) ?? [];
    list.push(row);
    groups.set(row.period, list);
  }
  return [...groups.entries()];
}
