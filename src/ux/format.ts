import type { ClassType, DailyStatus, PeriodTiming } from '../types/index.js';

export const md = {
  b: (s: string) => `**${s}**`,
  i: (s: string) => `_${s}_`,
  li: (s: string) => `• ${s}`,
  kv: (k: string, v: string) => `**${k}:** ${v}`
};

export function plural(n: number, one: string, many = `${one}s`): string {
  return `${n} ${n === 1 ? one : many}`;
}

const CLASS_TYPE_LABELS: Record<ClassType, string> = {
  theory: 'Theory',
  lab: 'Lab',
  'mini-project': 'Mini Project'
};

export function classTypeLabel(type: ClassType): string {
  return CLASS_TYPE_LABELS[type];
}

/** "Period 3 (09:45-10:30)" from the timing row's label, or just "Period 3" without one. */
export function periodLabel(period: number, timing: PeriodTiming | null): string {
  return timing ? `${timing.label} (${timing.start}-${timing.end})` : `Period ${period}`;
}

/** Inline marker for an absent or swapped slot; empty when nothing to flag. */
export function statusNote(status: DailyStatus | null): string {
  if (!status) return '';
  const notes: string[] = [];
  if (status.isAbsent) {
    notes.push(status.absentReason ? `ABSENT: ${status.absentReason}` : 'ABSENT');
  }
  if (status.isSwapped) {
    const who = status.swappedWith ?? 'another faculty';
    notes.push(status.swapReason ? `SWAPPED with ${who}: ${status.swapReason}` : `SWAPPED with ${who}`);
  }
  return notes.length ? ` [${notes.join('; ')}]` : '';
}

export function lines(...rows: Array<string | null | undefined | false>): string {
  return rows.filter((r): r is string => typeof r === 'string').join('\n');
}
