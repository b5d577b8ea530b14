import {
  DEFAULT_MEETING_BUFFER_MINUTES,
  DEFAULT_TASK_DURATION,
} from '../constants';
import { findBlocker, findNextAvailableSlot, relevantIntervals, type SlotSearchOptions } from './slotFinder';
import { truncateToMinute } from './time';
import type { BusyInterval } from './types';

export type ConflictOptions = Omit<SlotSearchOptions, 'after'> & {
  /** Anchor used when there is no desired time. Defaults to the current time. */
  now?: Date;
};

export interface ConflictResolution {
  time: Date;
  /** True when `time` is not the requested time (including when none was requested). */
  changed: boolean;
  /** True when the slot search hit its horizon; the time may still collide. */
  degraded: boolean;
}

/**
 * Whether `[start, start + duration)` collides with a busy interval or, for
 * low-intensity tasks, falls inside a meeting buffer.
 */
export function hasConflict(start: Date, busy: readonly BusyInterval[], options: ConflictOptions = {}): boolean {
  const blocker = findBlocker(
    start,
    relevantIntervals(busy, options.excludeTaskId),
    Math.max(1, options.durationMinutes ?? DEFAULT_TASK_DURATION),
    options.avoidNaps ?? false,
    options.meetingBufferMinutes ?? DEFAULT_MEETING_BUFFER_MINUTES,
  );
  return blocker !== null;
}

/**
 * Keep a collision-free desired time, otherwise search forward from it.
 * Without a desired time the search starts now. Shifts only ever move later.
 */
export function resolveConflict(
  desired: Date | null,
  busy: readonly BusyInterval[],
  options: ConflictOptions = {},
): ConflictResolution {
  const { now, ...searchOptions } = options;

  if (!desired) {
    const slot = findNextAvailableSlot(busy, { ...searchOptions, after: now ?? new Date() });
    return { time: slot.start, changed: true, degraded: slot.exhausted };
  }

  const requested = truncateToMinute(desired);
  if (!hasConflict(requested, busy, searchOptions)) {
    return { time: requested, changed: false, degraded: false };
  }

  const slot = findNextAvailableSlot(busy, { ...searchOptions, after: requested });
  return { time: slot.start, changed: true, degraded: slot.exhausted };
}
