// Phrase tables in normalized form (see normalizeText): lowercase, no apostrophes.

export const GREETINGS = ['hi', 'hii', 'hiii', 'hello', 'hey', 'greetings', 'good morning', 'good afternoon', 'good evening'];
export const GREETING_TAIL_WORDS = 2;
// the only words allowed after a greeting: "hi there", "hello everyone"
export const GREETING_FILLERS = ['there', 'bot', 'everyone', 'all', 'sir', 'maam', 'madam', 'team', 'friend', 'friends', 'guys', 'again'];

export const HELP_PHRASES = ['help', 'commands', 'what can you do', 'how to use', 'guide', 'guide me', 'menu'];

export const DETAIL_WORDS = ['contact', 'contacts', 'email', 'mail', 'phone', 'mobile', 'details', 'detail', 'profile', 'experience', 'research'];

export const TOPIC_WORDS = ['topic', 'topics', 'teach', 'teaches', 'taught', 'cover', 'covered', 'portion', 'portions'];

export const CLASS_TYPE_PHRASES = {
  lab: ['lab today', 'labs today', 'who has lab', 'who have lab', 'lab class', 'lab classes', 'lab hour', 'lab hours', 'lab day', 'lab days', 'practical'],
  theory: ['theory today', 'who has theory', 'who have theory', 'theory class', 'theory classes'],
  'mini-project': ['mini project', 'mini-project', 'miniproject']
} as const;

export const TOKENS = {
  absentees: ['absent', 'absence', 'absentee', 'absentees', 'on leave', 'leave today', 'not present', 'missing faculty', 'not came', 'didnt come'],
  today_summary: ['summary', 'overview', 'status today', 'todays status', 'how many classes', 'entries filled', 'pending entries'],
  topics_today: ['topics covered', 'topic covered', 'covered today', 'topics today', 'todays topics', 'taught today', 'what was covered'],
  teaching_history: ['what was taught', 'what did', 'recently taught', 'recent class', 'recent classes', 'last class', 'previous class', 'teaching history', 'class history', 'recent topics'],
  today_schedule: ['schedule', 'timetable', 'classes today', 'class today', 'who has', 'who have', 'teaching today', 'todays classes', 'today', 'todays']
};

export const LIST_WORDS = ['list', 'show', 'all', 'every', 'display'];
export const FACULTY_WORDS = ['faculty', 'faculties', 'teacher', 'teachers', 'instructor', 'instructors', 'staff', 'professor', 'professors'];

export function hasPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some(p => containsPhrase(text, p));
}

/** Whole-word phrase containment on normalized text. */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!phrase) return false;
  return ` ${text} `.includes(` ${phrase} `);
}
