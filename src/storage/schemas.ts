import { z } from 'zod';
import type { Intent } from '../types/index.js';

const INTENTS = [
  'greeting',
  'help',
  'faculty_topic',
  'faculty_schedule',
  'faculty_details',
  'department_schedule',
  'class_type',
  'period_schedule',
  'weekday_schedule',
  'session_ppt',
  'lab_program',
  'absentees',
  'today_summary',
  'topics_today',
  'teaching_history',
  'list_faculty',
  'today_schedule'
] as const satisfies readonly Intent[];

export const IntentSchema = z.enum(INTENTS);

const DayNameSchema = z.enum(['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']);
const ISODate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const DepartmentSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1)
});

export const FacultySchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  email: z.string().default(''),
  phone: z.string().default(''),
  departmentCode: z.string().nullable().default(null),
  experience: z.string().nullable().default(null),
  researchArea: z.string().nullable().default(null),
  active: z.boolean().default(true)
});

export const PeriodTimingSchema = z.object({
  period: z.number().int().positive(),
  start: z.string(),
  end: z.string(),
  label: z.string()
});

export const ScheduleFactSchema = z.object({
  facultyId: z.number().int(),
  departmentCode: z.string().min(1),
  day: DayNameSchema,
  period: z.number().int().positive(),
  classType: z.enum(['theory', 'lab', 'mini-project']).default('theory'),
  subjectCode: z.string().optional(),
  room: z.string().optional()
});

export const DailyStatusSchema = z.object({
  facultyId: z.number().int(),
  departmentCode: z.string().min(1),
  date: ISODate,
  period: z.number().int().positive(),
  isAbsent: z.boolean().default(false),
  absentReason: z.string().nullable().default(null),
  isSwapped: z.boolean().default(false),
  swappedWith: z.string().nullable().default(null),
  swapReason: z.string().nullable().default(null),
  topicRef: z.number().int().nullable().default(null),
  topic: z.string().nullable().default(null),
  summary: z.string().nullable().default(null)
});

export const SyllabusSessionSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  unit: z.number().int().positive(),
  topics: z.string().default(''),
  pptUrl: z.string().nullable().default(null)
});

export const LabProgramSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string().default(''),
  moodleUrl: z.string().nullable().default(null)
});

export const FAQEntrySchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  category: z.string().default('general'),
  active: z.boolean().default(true)
});

export const IntentExampleSchema = z.object({
  intent: IntentSchema,
  examples: z.array(z.string().min(1)).min(1)
});

export const DataSnapshotSchema = z.object({
  departments: z.array(DepartmentSchema).default([]),
  faculty: z.array(FacultySchema).default([]),
  timetable: z.array(ScheduleFactSchema).default([]),
  dailyEntries: z.array(DailyStatusSchema).default([]),
  syllabus: z.array(SyllabusSessionSchema).default([]),
  labPrograms: z.array(LabProgramSchema).default([]),
  periodTimings: z.array(PeriodTimingSchema).default([]),
  faqs: z.array(FAQEntrySchema).default([])
});

export type DataSnapshot = z.infer<typeof DataSnapshotSchema>;
export type DataSnapshotInput = z.input<typeof DataSnapshotSchema>;
