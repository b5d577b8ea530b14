// src/config.ts
import {
  DEFAULT_BLOCK_MINUTES,
  DEFAULT_CALENDAR_QUERY_LIMIT,
  DEFAULT_HORIZON_HOURS,
  DEFAULT_MEETING_BUFFER_MINUTES,
} from './constants';

export interface SchedulerSettings {
  blockMinutes: number;
  horizonHours: number;
  meetingBufferMinutes: number;
  calendarQueryLimit: number;
  timezone: string;
}

export interface AppConfig {
  port: number;
  mongoUri: string;
  jwtSecret: string;
  accessKey?: string;
  scheduler: SchedulerSettings;
}

/**
 * Read a positive integer from the environment, falling back to the default
 * when the variable is missing or not a positive number.
 */
export function readPositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveInt(env.PORT, 3000),
    mongoUri: env.MONGODB_URI || 'mongodb://127.0.0.1:27017/mood-scheduler',
    jwtSecret: env.JWT_SECRET || 'change-me',
    accessKey: env.ACCESS_KEY || undefined,
    scheduler: {
      blockMinutes: readPositiveInt(env.SCHEDULER_BLOCK_MINUTES, DEFAULT_BLOCK_MINUTES),
      horizonHours: readPositiveInt(env.SCHEDULER_HORIZON_HOURS, DEFAULT_HORIZON_HOURS),
      meetingBufferMinutes: readPositiveInt(env.SCHEDULER_MEETING_BUFFER_MINUTES, DEFAULT_MEETING_BUFFER_MINUTES),
      calendarQueryLimit: readPositiveInt(env.CALENDAR_QUERY_LIMIT, DEFAULT_CALENDAR_QUERY_LIMIT),
      timezone: env.USER_TIMEZONE || 'UTC',
    },
  };
}

export const config = loadConfig();
