// src/utils/timezone.ts
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import { config } from '../config';

dayjs.extend(utc);
dayjs.extend(timezone);

export const USER_TIMEZONE = config.scheduler.timezone;

/**
 * Convert an instant to the user's timezone
 */
export function toLocalTime(date: Date | string, tz: string = USER_TIMEZONE): dayjs.Dayjs {
  return dayjs(date).tz(tz);
}

/**
 * Interpret a wall-clock string ("2024-06-15 15:00", "2024-06-15T15:00") in the
 * given timezone. Strings carrying "Z" or an offset keep their own zone.
 * Returns null for anything dayjs cannot read.
 */
export function parseLocalDate(dateString: string, tz: string = USER_TIMEZONE): Date | null {
  const hasZone = /(?:z|[+-]\d{2}:?\d{2})$/i.test(dateString.trim());
  if (hasZone) {
    const parsed = dayjs(dateString);
    return parsed.isValid() ? parsed.toDate() : null;
  }
  // dayjs.tz throws on input it cannot read, so check the wall-clock string first
  if (!dayjs.utc(dateString).isValid()) return null;
  const parsed = dayjs.tz(dateString, tz);
  return parsed.isValid() ? parsed.toDate() : null;
}

/**
 * Build an instant from a local calendar day plus hour and minute.
 */
export function atLocalTime(day: dayjs.Dayjs, hour: number, minute: number, tz: string = USER_TIMEZONE): Date {
  const wallClock = `${day.format('YYYY-MM-DD')} ${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
  return dayjs.tz(wallClock, tz).toDate();
}

/**
 * Format a date in the user's timezone
 */
export function formatLocalDate(date: Date | string, format: string = 'YYYY-MM-DD HH:mm', tz: string = USER_TIMEZONE): string {
  return toLocalTime(date, tz).format(format);
}
