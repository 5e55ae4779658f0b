/**
 * Shared in-memory campus data for the test suites.
 * 2026-10-19 is a Monday, 2026-10-21 a Wednesday, 2026-10-22 a Thursday.
 */

import type { Department, Faculty, IntentExample } from '../src/types/index.js';
import type { DataSnapshotInput } from '../src/storage/schemas.js';
import { SnapshotStore } from '../src/storage/snapshotStore.js';

export const MONDAY = '2026-10-19';
export const WEDNESDAY = '2026-10-21';
export const THURSDAY = '2026-10-22';

export const DEPARTMENTS: Department[] = [
  { code: 'AIDS-A', name: 'AI and Data Science A' },
  { code: 'CSE-A', name: 'Computer Science A' },
  { code: 'IT-A', name: 'Information Technology A' },
  { code: 'CYS', name: 'Cyber Security' },
  { code: 'RA', name: 'Robotics and Automation' }
];

export const FACULTY: Faculty[] = [
  { id: 1, name: 'Priya Raman', email: 'priya@example.edu', phone: '000-000-0001', departmentCode: 'AIDS-A', experience: '8', researchArea: null, active: true },
  { id: 2, name: 'Karthik Subramani', email: 'karthik@example.edu', phone: '000-000-0002', departmentCode: 'CSE-A', experience: '12', researchArea: null, active: true },
  { id: 3, name: 'Meena Lakshmi', email: 'meena@example.edu', phone: '000-000-0003', departmentCode: 'IT-A', experience: null, researchArea: null, active: true },
  { id: 4, name: 'Harish Velu', email: 'harish@example.edu', phone: '000-000-0004', departmentCode: 'RA', experience: null, researchArea: null, active: true },
  { id: 5, name: 'Ramesh Ganesan', email: 'ramesh@example.edu', phone: '000-000-0005', departmentCode: 'CYS', experience: null, researchArea: null, active: false }
];

export const SNAPSHOT: DataSnapshotInput = {
  departments: DEPARTMENTS,
  faculty: FACULTY,
  periodTimings: [
    { period: 1, start: '08:00', end: '08:45', label: 'Period 1' },
    { period: 2, start: '08:45', end: '09:30', label: 'Period 2' },
    { period: 3, start: '09:45', end: '10:30', label: 'Period 3' },
    { period: 4, start: '10:30', end: '11:15', label: 'Period 4' },
    { period: 6, start: '01:00', end: '01:45', label: 'Period 6' }
  ],
  timetable: [
    { facultyId: 2, departmentCode: 'CSE-A', day: 'Wednesday', period: 3, classType: 'theory' },
    { facultyId: 1, departmentCode: 'AIDS-A', day: 'Wednesday', period: 3, classType: 'theory' },
    { facultyId: 3, departmentCode: 'IT-A', day: 'Wednesday', period: 1, classType: 'lab' },
    { facultyId: 4, departmentCode: 'RA', day: 'Wednesday', period: 6, classType: 'lab' },
    { facultyId: 1, departmentCode: 'AIDS-A', day: 'Thursday', period: 2, classType: 'lab' },
    { facultyId: 2, departmentCode: 'CSE-A', day: 'Thursday', period: 4, classType: 'theory' },
    { facultyId: 1, departmentCode: 'AIDS-A', day: 'Monday', period: 1, classType: 'theory' },
    { facultyId: 3, departmentCode: 'IT-A', day: 'Monday', period: 2, classType: 'mini-project' }
  ],
  dailyEntries: [
    { facultyId: 1, departmentCode: 'AIDS-A', date: WEDNESDAY, period: 3, topicRef: 4, topic: 'Operators and Expressions' },
    { facultyId: 2, departmentCode: 'CSE-A', date: WEDNESDAY, period: 3, isAbsent: true, absentReason: 'Medical leave' },
    { facultyId: 1, departmentCode: 'AIDS-A', date: MONDAY, period: 1, isSwapped: true, swappedWith: 'Harish Velu', topic: 'Data Types' }
  ],
  syllabus: [
    { number: 5, title: 'Decision Making', unit: 2, topics: 'if, switch', pptUrl: 'https://lms.example.edu/session-5.pptx' },
    { number: 6, title: 'Loops', unit: 2, topics: '', pptUrl: null }
  ],
  labPrograms: [
    { number: 3, title: 'Largest of Three Numbers', description: 'Use nested if statements', moodleUrl: 'https://lms.example.edu/lab-3' },
    { number: 4, title: 'Grade Calculator', description: '', moodleUrl: null }
  ],
  faqs: [
    { question: 'What is a pointer in C?', answer: 'A pointer stores the memory address of another variable.', category: 'concepts' },
    { question: 'What is recursion?', answer: 'A function calling itself.', category: 'concepts', active: false }
  ]
};

export const EXAMPLES: IntentExample[] = [
  { intent: 'greeting', examples: ['hello', 'good morning'] },
  { intent: 'list_faculty', examples: ['faculty members', 'show all staff'] },
  { intent: 'absentees', examples: ['who took leave'] },
  { intent: 'lab_program', examples: ['lab exercise details'] }
];

export function createStore(): SnapshotStore {
  return SnapshotStore.from(SNAPSHOT);
}
