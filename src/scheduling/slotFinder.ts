import { addHours, addMinutes } from 'date-fns';
import {
  DEFAULT_BLOCK_MINUTES,
  DEFAULT_HORIZON_HOURS,
  DEFAULT_MEETING_BUFFER_MINUTES,
  DEFAULT_TASK_DURATION,
} from '../constants';
import { isMeetingLabel, overlaps, sortBusyIntervals } from './intervals';
import { roundUpToBlock } from './time';
import type { BusyInterval } from './types';

export interface SlotSearchOptions {
  /** Anchor of the search. Defaults to the current time. */
  after?: Date;
  blockMinutes?: number;
  durationMinutes?: number;
  meetingBufferMinutes?: number;
  /** Keep the slot out of the buffer zone around meetings (naps, rest). */
  avoidNaps?: boolean;
  horizonHours?: number;
  /** Intervals owned by this task are ignored, so a task never collides with itself. */
  excludeTaskId?: string;
}

export interface SlotSearchResult {
  start: Date;
  /** True when the horizon ran out and `start` is the best-effort fallback. */
  exhausted: boolean;
}

export type Blocker =
  | { kind: 'overlap'; interval: BusyInterval; resumeAt: Date }
  | { kind: 'meeting_buffer'; interval: BusyInterval; resumeAt: Date };

export function relevantIntervals(busy: readonly BusyInterval[], excludeTaskId?: string): BusyInterval[] {
  const owned = excludeTaskId ? busy.filter(interval => interval.taskId !== excludeTaskId) : busy;
  return sortBusyIntervals(owned);
}

/**
 * First busy interval (in start order) that rules out `[start, start + duration)`.
 * Plain overlaps are checked before meeting buffers.
 */
export function findBlocker(
  start: Date,
  sortedBusy: readonly BusyInterval[],
  durationMinutes: number,
  avoidNaps: boolean,
  meetingBufferMinutes: number,
): Blocker | null {
  const slot = { start, end: addMinutes(start, durationMinutes) };

  const collision = sortedBusy.find(interval => overlaps(slot, interval));
  if (collision) {
    return { kind: 'overlap', interval: collision, resumeAt: collision.end };
  }

  if (!avoidNaps) return null;

  for (const interval of sortedBusy) {
    if (!isMeetingLabel(interval.label)) continue;

    const bufferZone = {
      start: addMinutes(interval.start, -meetingBufferMinutes),
      end: addMinutes(interval.end, meetingBufferMinutes),
    };
    if (overlaps(slot, bufferZone)) {
      return { kind: 'meeting_buffer', interval, resumeAt: bufferZone.end };
    }
  }

  return null;
}

/**
 * Forward first-fit search for the earliest block-aligned start that collides
 * with nothing. Each blocked candidate jumps to the block boundary at or after
 * the blocking interval's end (or its buffer end), so back-to-back placement is
 * allowed and every step strictly advances.
 *
 * Never throws: when the horizon is exhausted the rounded horizon boundary is
 * returned with `exhausted: true`, and that time may itself collide.
 */
export function findNextAvailableSlot(
  busy: readonly BusyInterval[],
  options: SlotSearchOptions = {},
): SlotSearchResult {
  const after = options.after ?? new Date();
  const blockMinutes = options.blockMinutes ?? DEFAULT_BLOCK_MINUTES;
  const durationMinutes = Math.max(1, options.durationMinutes ?? DEFAULT_TASK_DURATION);
  const meetingBufferMinutes = options.meetingBufferMinutes ?? DEFAULT_MEETING_BUFFER_MINUTES;
  const horizonHours = options.horizonHours ?? DEFAULT_HORIZON_HOURS;
  const avoidNaps = options.avoidNaps ?? false;

  const sortedBusy = relevantIntervals(busy, options.excludeTaskId);
  const horizon = addHours(after, horizonHours);

  let candidate = roundUpToBlock(addMinutes(after, 1), blockMinutes);

  while (candidate < horizon) {
    const blocker = findBlocker(candidate, sortedBusy, durationMinutes, avoidNaps, meetingBufferMinutes);
    if (!blocker) {
      return { start: candidate, exhausted: false };
    }
    const next = roundUpToBlock(blocker.resumeAt, blockMinutes);
    // an interval ending mid-minute can truncate back onto the current candidate
    candidate = next > candidate ? next : roundUpToBlock(addMinutes(candidate, 1), blockMinutes);
  }

  return { start: roundUpToBlock(horizon, blockMinutes), exhausted: true };
}
