import { addMinutes } from 'date-fns';
import { escapeRegExp, sortBy } from 'lodash';
import {
  DEFAULT_TASK_DURATION,
  LOW_INTENSITY_KEYWORDS,
  MAX_ENTRY_DURATION,
  MAX_ENTRY_TITLE_LENGTH,
  MEETING_KEYWORDS,
  MIN_ENTRY_DURATION,
} from '../constants';
import type { BusyInterval, CalendarEntry } from './types';

const DURATION_TAG = /\((\d+)\s*m\)/i;

export function clampDuration(minutes: number): number {
  return Math.max(MIN_ENTRY_DURATION, Math.min(MAX_ENTRY_DURATION, minutes));
}

/**
 * Read the `(<N>m)` duration tag from an entry label, e.g. "Task#7 (15m): stretch".
 * The value is clamped to [5, 240]; a missing or unreadable tag yields the default.
 */
export function decodeDuration(label: string | null | undefined, defaultMinutes: number = DEFAULT_TASK_DURATION): number {
  if (!label) return defaultMinutes;

  const match = DURATION_TAG.exec(label);
  if (!match) return defaultMinutes;

  const minutes = Number.parseInt(match[1], 10);
  if (!Number.isFinite(minutes)) return defaultMinutes;

  return clampDuration(minutes);
}

/**
 * Duration of a stored entry: the structured field when present, the label tag otherwise.
 */
export function entryDuration(entry: Pick<CalendarEntry, 'label' | 'durationMinutes'>): number {
  const { durationMinutes } = entry;
  if (typeof durationMinutes === 'number' && Number.isFinite(durationMinutes)) {
    return clampDuration(Math.round(durationMinutes));
  }
  return decodeDuration(entry.label);
}

export function toBusyInterval(entry: CalendarEntry): BusyInterval {
  const taskId = entry.taskId ?? taskIdFromLabel(entry.label);
  return {
    start: entry.start,
    end: addMinutes(entry.start, entryDuration(entry)),
    label: entry.label,
    ...(taskId ? { taskId } : {}),
  };
}

/**
 * Half-open intersection test. Back-to-back spans (`a.end === b.start`) do not overlap.
 */
export function overlaps(a: { start: Date; end: Date }, b: { start: Date; end: Date }): boolean {
  return a.end.getTime() > b.start.getTime() && a.start.getTime() < b.end.getTime();
}

export function sortBusyIntervals(intervals: readonly BusyInterval[]): BusyInterval[] {
  return sortBy(intervals, interval => interval.start.getTime());
}

/**
 * Append a freshly reserved interval without touching the caller's array.
 */
export function withReservation(intervals: readonly BusyInterval[], interval: BusyInterval): BusyInterval[] {
  return [...intervals, interval];
}

export function normalizeTitle(title: string | null | undefined, maxLength: number): string {
  return (title ?? '').replace(/\s+/g, ' ').trim().slice(0, maxLength);
}

export function formatEntryLabel(taskId: string, title: string, durationMinutes: number): string {
  const minutes = clampDuration(Math.round(durationMinutes));
  return `Task#${taskId} (${minutes}m): ${normalizeTitle(title, MAX_ENTRY_TITLE_LENGTH)}`;
}

export function taskLabelPrefix(taskId: string): string {
  return `Task#${taskId} `;
}

/**
 * Owner id encoded in a task-linked label, for entries stored without `taskId`.
 */
export function taskIdFromLabel(label: string): string | null {
  const match = /^Task#(\S+) /.exec(label);
  return match ? match[1] : null;
}

// Word-prefix match: "Calling" and "reviewing" count, "recall" does not.
function keywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map(keyword => escapeRegExp(keyword).replace(/\s+/g, '\\s+'));
  return new RegExp(`\\b(?:${alternatives.join('|')})`, 'i');
}

const MEETING_PATTERN = keywordPattern(MEETING_KEYWORDS);
const LOW_INTENSITY_PATTERN = keywordPattern(LOW_INTENSITY_KEYWORDS);

export function isMeetingLabel(label: string | null | undefined): boolean {
  return !!label && MEETING_PATTERN.test(label);
}

export function isLowIntensityTitle(title: string | null | undefined): boolean {
  return !!title && LOW_INTENSITY_PATTERN.test(title);
}
