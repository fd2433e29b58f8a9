import type { DueStatus, Task } from './model.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Format a Date as yyyy-MM-dd (UTC calendar). */
export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(d: Date, n: number): Date {
  return new Date(d.getTime() + n * DAY_MS);
}

/** True for a real calendar date in yyyy-MM-dd form (rejects 2026-02-30). */
export function isCalendarDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  const d = new Date(`${input}T00:00:00.000Z`);
  return !Number.isNaN(d.getTime()) && formatDate(d) === input;
}

/** Whole days from `from` to `to`, both yyyy-MM-dd. */
export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00.000Z`) - Date.parse(`${from}T00:00:00.000Z`)) / DAY_MS);
}

export function isOverdue(task: Pick<Task, 'dueDate' | 'completed'>, now: Date): boolean {
  if (!task.dueDate || task.completed) return false;
  return task.dueDate < formatDate(now);
}

export function dueStatusOf(task: Pick<Task, 'dueDate' | 'completed'>, now: Date): DueStatus {
  if (!task.dueDate) return 'no_due_date';
  if (task.completed) return 'completed';

  const diff = daysBetween(formatDate(now), task.dueDate);
  if (diff < 0) return 'overdue';
  if (diff === 0) return 'today';
  if (diff <= 3) return 'soon';
  return 'upcoming';
}

/** Monday (UTC) of the week containing the given timestamp, as yyyy-MM-dd. */
export function weekStartOf(iso: string): string {
  const d = new Date(iso);
  const offset = (d.getUTCDay() + 6) % 7;
  return formatDate(addDays(d, -offset));
}
