// src/utils/desiredTime.ts
import { addDays, addHours, addMinutes } from 'date-fns';
import { DEFAULT_EVENING_HOUR, DEFAULT_MORNING_HOUR, UNSCHEDULED } from '../constants';
import { USER_TIMEZONE, atLocalTime, parseLocalDate, toLocalTime } from './timezone';

export interface DesiredTimeOptions {
  now?: Date;
  timezone?: string;
}

interface ClockTime {
  hour: number;
  minute: number;
}

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:z|[+-]\d{2}:?\d{2})?$/i;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function parseClockTime(text: string): ClockTime | null {
  const twelveHour = /\b(\d{1,2})(?::([0-5]\d))?\s*(am|pm)\b/.exec(text);
  if (twelveHour) {
    const hour = Number(twelveHour[1]);
    if (hour < 1 || hour > 12) return null;
    const minute = Number(twelveHour[2] ?? 0);
    const isPm = twelveHour[3] === 'pm';
    return { hour: (hour % 12) + (isPm ? 12 : 0), minute };
  }

  const twentyFourHour = /\b([01]?\d|2[0-3]):([0-5]\d)\b/.exec(text);
  if (twentyFourHour) {
    return { hour: Number(twentyFourHour[1]), minute: Number(twentyFourHour[2]) };
  }

  const bareHour = /\bat\s+([01]?\d|2[0-3])\b/.exec(text);
  if (bareHour) {
    return { hour: Number(bareHour[1]), minute: 0 };
  }

  return null;
}

function partOfDay(text: string): ClockTime | null {
  if (/\b(?:evening|tonight)\b/.test(text)) return { hour: DEFAULT_EVENING_HOUR, minute: 0 };
  if (/\bmorning\b/.test(text)) return { hour: DEFAULT_MORNING_HOUR, minute: 0 };
  return null;
}

/**
 * Turn a desired-time string into an instant.
 *
 * Accepts ISO-8601 (values without an offset are wall time in the timezone),
 * "in N minutes", "in N hours", and today/tomorrow phrases with an optional
 * clock time ("tomorrow at 9", "today 6:30pm", "15:30", "this evening").
 * A clock time with no day that has already passed today means tomorrow.
 * Anything else, including "unscheduled", yields null.
 */
export function parseDesiredTime(text: string | null | undefined, options: DesiredTimeOptions = {}): Date | null {
  const trimmed = (text ?? '').trim();
  if (!trimmed || trimmed.toLowerCase() === UNSCHEDULED) return null;

  const now = options.now ?? new Date();
  const tz = options.timezone ?? USER_TIMEZONE;

  if (ISO_DATE_TIME.test(trimmed)) {
    return parseLocalDate(trimmed.replace(' ', 'T'), tz);
  }
  if (ISO_DATE.test(trimmed)) {
    const day = parseLocalDate(trimmed, tz);
    return day ? atLocalTime(toLocalTime(day, tz), DEFAULT_MORNING_HOUR, 0, tz) : null;
  }

  const lower = trimmed.toLowerCase();

  const inMinutes = /\bin\s+(\d+)\s*(?:minutes?|mins?)\b/.exec(lower);
  if (inMinutes) return addMinutes(now, Number(inMinutes[1]));

  const inHours = /\bin\s+(\d+)\s*(?:hours?|hrs?)\b/.exec(lower);
  if (inHours) return addHours(now, Number(inHours[1]));

  const isTomorrow = /\btomorrow\b/.test(lower);
  const isToday = /\btoday\b/.test(lower);

  const time = parseClockTime(lower) ?? partOfDay(lower) ?? (isTomorrow ? { hour: DEFAULT_MORNING_HOUR, minute: 0 } : null);
  if (!time) return null;

  const localNow = toLocalTime(now, tz);
  const day = isTomorrow ? localNow.add(1, 'day') : localNow;
  const result = atLocalTime(day, time.hour, time.minute, tz);

  if (!isTomorrow && !isToday && result <= now) {
    return addDays(result, 1);
  }
  return result;
}
