import { addMinutes, startOfMinute } from 'date-fns';
import { MILLISECONDS_PER_MINUTE, UNSCHEDULED } from '../constants';

/**
 * Drop seconds and milliseconds.
 */
export function truncateToMinute(date: Date): Date {
  return startOfMinute(date);
}

/**
 * Round forward to the next multiple of `blockMinutes`, after truncating to the
 * minute. A time already on a block boundary is returned unchanged; rounding
 * never moves backwards past the truncated minute.
 *
 * Blocks are counted from the epoch, so 15- and 30-minute blocks line up with
 * wall-clock quarter hours in every zone with a whole- or half-hour offset.
 */
export function roundUpToBlock(date: Date, blockMinutes: number): Date {
  const block = Math.max(1, Math.floor(blockMinutes));
  const truncated = truncateToMinute(date);
  const epochMinutes = Math.floor(truncated.getTime() / MILLISECONDS_PER_MINUTE);
  const remainder = epochMinutes % block;
  return remainder === 0 ? truncated : addMinutes(truncated, block - remainder);
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse a stored scheduled time. Returns null for the "unscheduled" sentinel
 * and for anything that is not a valid instant.
 */
export function parseScheduledTime(value: string | null | undefined): Date | null {
  if (!value || value === UNSCHEDULED) return null;
  const parsed = new Date(value);
  return isValidDate(parsed) ? parsed : null;
}
