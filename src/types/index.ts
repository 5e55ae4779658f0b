// Calendar Types
export type DayName =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

export type ClassType = 'theory' | 'lab' | 'mini-project';

// Catalog Types
export interface Department {
  code: string;
  name: string;
}

export interface Faculty {
  id: number;
  name: string;
  email: string;
  phone: string;
  departmentCode: string | null;
  experience: string | null;
  researchArea: string | null;
  active: boolean;
}

export interface PeriodTiming {
  period: number;
  start: string;
  end: string;
  label: string;
}

// Schedule Types
export interface ScheduleFact {
  facultyId: number;
  departmentCode: string;
  day: DayName;
  period: number;
  classType: ClassType;
  subjectCode?: string;
  room?: string;
}

export interface ScheduleFilter {
  day: DayName;
  facultyId?: number;
  departmentCode?: string;
  period?: number;
  classType?: ClassType;
}

export interface DailyStatus {
  facultyId: number;
  departmentCode: string;
  date: string;
  period: number;
  isAbsent: boolean;
  absentReason: string | null;
  isSwapped: boolean;
  swappedWith: string | null;
  swapReason: string | null;
  topicRef: number | null;
  topic: string | null;
  summary: string | null;
}

export interface DailyStatusFilter {
  date: string;
  facultyId?: number;
  departmentCode?: string;
  period?: number;
}

// Syllabus & Lab Types
export interface SyllabusSession {
  number: number;
  title: string;
  unit: number;
  topics: string;
  pptUrl: string | null;
}

export interface LabProgram {
  number: number;
  title: string;
  description: string;
  moodleUrl: string | null;
}

// FAQ Types
export interface FAQEntry {
  question: string;
  answer: string;
  category: string;
  active: boolean;
}

/**
 * Read-only lookups served by whatever owns the campus data.
 * Rejections are collaborator failures and are never masked by the bot.
 */
export interface DataStore {
  scheduleFor(filter: ScheduleFilter): Promise<ScheduleFact[]>;
  weeklyScheduleFor(facultyId: number): Promise<ScheduleFact[]>;
  facultyById(id: number): Promise<Faculty | null>;
  allActiveFaculty(): Promise<Faculty[]>;
  departments(): Promise<Department[]>;
  dailyStatus(filter: DailyStatusFilter): Promise<DailyStatus[]>;
  recentDailyStatus(limit: number): Promise<DailyStatus[]>;
  syllabusSession(number: number): Promise<SyllabusSession | null>;
  labProgram(number: number): Promise<LabProgram | null>;
  periodTimings(): Promise<PeriodTiming[]>;
  faqCatalog(): Promise<FAQEntry[]>;
}

// Intent Types
export type Intent =
  | 'greeting'
  | 'help'
  | 'faculty_topic'
  | 'faculty_schedule'
  | 'faculty_details'
  | 'department_schedule'
  | 'class_type'
  | 'period_schedule'
  | 'weekday_schedule'
  | 'session_ppt'
  | 'lab_program'
  | 'absentees'
  | 'today_summary'
  | 'topics_today'
  | 'teaching_history'
  | 'list_faculty'
  | 'today_schedule';

export interface IntentExample {
  intent: Intent;
  examples: string[];
}

export interface Entities {
  period?: number;
  session?: number;
  lab?: number;
  department?: Department;
  weekday?: DayName;
  faculty?: Faculty;
  classType?: ClassType;
}

export interface Query {
  id: string;
  rawText: string;
  normalizedText: string;
  today: string;
  dayName: DayName;
  entities: Entities;
}

export type MatchStage = 'rule' | 'faq' | 'semantic' | 'default';

// Error Types
export class BotError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'BotError';
  }
}
