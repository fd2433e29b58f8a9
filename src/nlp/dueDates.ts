/**
 * Finds a due-date phrase inside free text and resolves it to yyyy-MM-dd.
 * Supports: today, tonight, this morning/afternoon/evening, tomorrow,
 * yesterday, this week / end of week (Sunday), next week (Monday),
 * this month / end of month, next month, in N days/weeks, next <weekday>,
 * <weekday>, month + day (mar 5, march 5th) and ISO dates.
 *
 * All arithmetic is on UTC calendar days.
 */
import { addDays, formatDate, isCalendarDate } from '../dates.js';

export interface DueMatch {
  /** yyyy-MM-dd */
  date: string;
  /** Matched text, including a leading "by", "on", "due" or "before". */
  phrase: string;
  index: number;
}

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const WEEKDAY_SRC = `(${WEEKDAYS.join('|')})`;
const MONTH_SRC =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

type Resolver = (m: RegExpExecArray, today: Date) => string | null;

interface Rule {
  re: RegExp;
  resolve: Resolver;
}

function rule(src: string, resolve: Resolver): Rule {
  return { re: new RegExp(`(?:\\b(?:by|on|due|before)\\s+)?\\b${src}\\b`, 'i'), resolve };
}

/** Days from today until the given weekday; 7 when it is today. */
function daysUntil(weekday: string, today: Date): number {
  const target = WEEKDAYS.indexOf(weekday.toLowerCase());
  const ahead = (target - today.getUTCDay() + 7) % 7;
  return ahead === 0 ? 7 : ahead;
}

function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

function monthDay(monthName: string, dayText: string, today: Date): string | null {
  const month = MONTHS[monthName.slice(0, 3).toLowerCase()];
  if (month === undefined) return null;
  const day = Number(dayText);

  for (const year of [today.getUTCFullYear(), today.getUTCFullYear() + 1]) {
    const candidate = formatDate(utcDate(year, month, day));
    // Date.UTC rolls Feb 30 over into March
    if (Number(candidate.slice(8)) !== day) continue;
    // a date already past this year means next year
    if (candidate >= formatDate(today)) return candidate;
  }
  return null;
}

const RULES: Rule[] = [
  rule('(\\d{4}-\\d{2}-\\d{2})', (m) => (m[1] && isCalendarDate(m[1]) ? m[1] : null)),
  rule('(?:today|tonight|this\\s+(?:morning|afternoon|evening))', (_m, today) => formatDate(today)),
  rule('tomorrow', (_m, today) => formatDate(addDays(today, 1))),
  rule('yesterday', (_m, today) => formatDate(addDays(today, -1))),
  rule('(?:this\\s+week|end\\s+of\\s+(?:the\\s+)?week)', (_m, today) =>
    formatDate(addDays(today, (7 - today.getUTCDay()) % 7)),
  ),
  rule('next\\s+week', (_m, today) => formatDate(addDays(today, 7 - ((today.getUTCDay() + 6) % 7)))),
  rule('(?:this\\s+month|end\\s+of\\s+(?:the\\s+)?month)', (_m, today) =>
    formatDate(utcDate(today.getUTCFullYear(), today.getUTCMonth() + 1, 0)),
  ),
  rule('next\\s+month', (_m, today) => formatDate(utcDate(today.getUTCFullYear(), today.getUTCMonth() + 1, 1))),
  rule('in\\s+(\\d{1,3})\\s+days?', (m, today) => formatDate(addDays(today, Number(m[1])))),
  rule('in\\s+(\\d{1,2})\\s+weeks?', (m, today) => formatDate(addDays(today, Number(m[1]) * 7))),
  rule(`(?:next|this)\\s+${WEEKDAY_SRC}`, (m, today) => (m[1] ? formatDate(addDays(today, daysUntil(m[1], today))) : null)),
  rule(WEEKDAY_SRC, (m, today) => (m[1] ? formatDate(addDays(today, daysUntil(m[1], today))) : null)),
  rule(`${MONTH_SRC}\\s+(\\d{1,2})(?:st|nd|rd|th)?`, (m, today) => (m[1] && m[2] ? monthDay(m[1], m[2], today) : null)),
];

export function findDuePhrase(text: string, now: Date = new Date()): DueMatch | null {
  const today = utcDate(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());

  for (const { re, resolve } of RULES) {
    const m = re.exec(text);
    if (!m) continue;
    const date = resolve(m, today);
    if (date) return { date, phrase: m[0], index: m.index };
  }
  return null;
}

/** Resolve the first due-date phrase in `text`, or null. */
export function parseDuePhrase(text: string, now?: Date): string | null {
  return findDuePhrase(text, now)?.date ?? null;
}
