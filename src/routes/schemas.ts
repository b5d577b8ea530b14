// src/routes/schemas.ts
import { Response } from 'express';
import { z } from 'zod';
import {
  DEFAULT_TASK_DURATION,
  MAX_ENTRY_DURATION,
  MAX_ENTRY_TITLE_LENGTH,
  MAX_STAGGER_OFFSETS,
  MAX_TASK_TITLE_LENGTH,
  MIN_ENTRY_DURATION
} from '../constants';
import { MOOD_LABELS, PRIORITIES, TASK_MODES, TASK_STATUSES } from '../scheduling/types';

const MAX_PLAN_ITEMS = 20;

const durationSchema = z.number().int().min(MIN_ENTRY_DURATION).max(MAX_ENTRY_DURATION);
const offsetsSchema = z.array(z.number().int().min(0)).max(MAX_STAGGER_OFFSETS);

export const tokenRequestSchema = z.object({
  accessKey: z.string().min(1)
});

export const listTasksQuerySchema = z.object({
  mode: z.enum(TASK_MODES).optional()
});

export const createTaskSchema = z.object({
  title: z.string().trim().min(1).max(MAX_TASK_TITLE_LENGTH),
  mode: z.enum(TASK_MODES).optional(),
  userPriority: z.enum(PRIORITIES).optional(),
  scheduledTime: z.string().optional(),
  durationMinutes: durationSchema.optional(),
  autoSchedule: z.boolean().optional()
});

export const updateTaskSchema = z.object({
  title: z.string().trim().min(1).max(MAX_TASK_TITLE_LENGTH).optional(),
  mode: z.enum(TASK_MODES).optional(),
  userPriority: z.enum(PRIORITIES).optional(),
  scheduledTime: z.string().min(1).optional(),
  status: z.enum(TASK_STATUSES).optional(),
  durationMinutes: durationSchema.optional()
}).refine(body => Object.values(body).some(value => value !== undefined), {
  message: 'At least one field must be provided'
});

export const rescheduleTaskSchema = z.object({
  durationMinutes: durationSchema.optional()
});

export const createEntrySchema = z.object({
  label: z.string().trim().min(1).max(MAX_ENTRY_TITLE_LENGTH),
  start: z.coerce.date(),
  durationMinutes: durationSchema.optional()
});

export const resolveScheduleSchema = z.object({
  desiredTimeText: z.string().optional(),
  durationMinutes: durationSchema.default(DEFAULT_TASK_DURATION),
  avoidNaps: z.boolean().default(false),
  autoSchedule: z.boolean().default(true)
});

export const suggestSlotsSchema = z.object({
  baseTime: z.string().optional(),
  offsetsMinutes: offsetsSchema.optional(),
  durationMinutes: durationSchema.default(DEFAULT_TASK_DURATION),
  avoidNaps: z.boolean().default(false)
});

export const moodSignalSchema = z.object({
  label: z.enum(MOOD_LABELS),
  rawScore: z.number().default(0)
});

export const planTasksSchema = z.object({
  items: z.array(z.object({
    title: z.string().trim().min(1).max(MAX_TASK_TITLE_LENGTH),
    desiredTimeText: z.string().optional(),
    durationMinutes: durationSchema.optional(),
    mode: z.enum(TASK_MODES).optional(),
    userPriority: z.enum(PRIORITIES).optional(),
    staggerOffsets: offsetsSchema.optional()
  })).min(1).max(MAX_PLAN_ITEMS),
  mood: moodSignalSchema.optional()
});

export function sendValidationError(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: 'Invalid request', details: error.flatten() });
}
