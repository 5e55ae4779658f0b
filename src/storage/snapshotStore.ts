import type {
  DailyStatus,
  DailyStatusFilter,
  DataStore,
  Department,
  FAQEntry,
  Faculty,
  LabProgram,
  PeriodTiming,
  ScheduleFact,
  ScheduleFilter,
  SyllabusSession
} from '../types/index.js';
import { DataSnapshotSchema, type DataSnapshot, type DataSnapshotInput } from './schemas.js';

/**
 * DataStore over an in-memory snapshot (JSON files, or test fixtures).
 */
export class SnapshotStore implements DataStore {
  private readonly data: DataSnapshot;

  constructor(snapshot: DataSnapshot) {
    this.data = snapshot;
  }

  /** Validates and fills defaults, for fixtures written by hand. */
  static from(input: DataSnapshotInput): SnapshotStore {
    return new SnapshotStore(DataSnapshotSchema.parse(input));
  }

  async scheduleFor(filter: ScheduleFilter): Promise<ScheduleFact[]> {
    return this.data.timetable.filter(e =>
      e.day === filter.day &&
      (filter.facultyId === undefined || e.facultyId === filter.facultyId) &&
      (filter.departmentCode === undefined || e.departmentCode === filter.departmentCode) &&
      (filter.period === undefined || e.period === filter.period) &&
      (filter.classType === undefined || e.classType === filter.classType)
    );
  }

  async weeklyScheduleFor(facultyId: number): Promise<ScheduleFact[]> {
    return this.data.timetable.filter(e => e.facultyId === facultyId);
  }

  async facultyById(id: number): Promise<Faculty | null> {
    return this.data.faculty.find(f => f.id === id) ?? null;
  }

  async allActiveFaculty(): Promise<Faculty[]> {
    return this.data.faculty.filter(f => f.active);
  }

  async departments(): Promise<Department[]> {
    return [...this.data.departments];
  }

  async dailyStatus(filter: DailyStatusFilter): Promise<DailyStatus[]> {
    return this.data.dailyEntries.filter(d =>
      d.date === filter.date &&
      (filter.facultyId === undefined || d.facultyId === filter.facultyId) &&
      (filter.departmentCode === undefined || d.departmentCode === filter.departmentCode) &&
      (filter.period === undefined || d.period === filter.period)
    );
  }

  async recentDailyStatus(limit: number): Promise<DailyStatus[]> {
    return [...this.data.dailyEntries]
      .sort((a, b) => b.date.localeCompare(a.date) || a.period - b.period || a.facultyId - b.facultyId)
      .slice(0, Math.max(0, limit));
  }

  async syllabusSession(number: number): Promise<SyllabusSession | null> {
    return this.data.syllabus.find(s => s.number === number) ?? null;
  }

  async labProgram(number: number): Promise<LabProgram | null> {
    return this.data.labPrograms.find(p => p.number === number) ?? null;
  }

  async periodTimings(): Promise<PeriodTiming[]> {
    return [...this.data.periodTimings];
  }

  async faqCatalog(): Promise<FAQEntry[]> {
    return this.data.faqs.filter(f => f.active);
  }
}
