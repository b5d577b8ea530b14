export const PRIORITIES = ['low', 'medium', 'high'] as const;
export const TASK_MODES = ['work', 'personal'] as const;
export const TASK_STATUSES = ['planned', 'in_progress', 'completed'] as const;
export const MOOD_LABELS = [
  'tired',
  'anxious',
  'overwhelmed',
  'stuck',
  'energetic',
  'focused',
  'motivated',
  'neutral',
] as const;

export type Priority = (typeof PRIORITIES)[number];
export type TaskMode = (typeof TASK_MODES)[number];
export type TaskStatus = (typeof TASK_STATUSES)[number];
export type MoodLabel = (typeof MOOD_LABELS)[number];

export type Task = {
  id: string;
  title: string;
  mode: TaskMode;
  userPriority: Priority;
  effectivePriority: Priority;
  priorityReason: string | null;
  /** ISO-8601 instant, or the literal "unscheduled". */
  scheduledTime: string;
  status: TaskStatus;
  createdAt: Date;
};

export type CalendarEntry = {
  id: string;
  label: string;
  start: Date;
  durationMinutes?: number;
  taskId?: string;
  createdAt: Date;
};

export interface MoodSignal {
  label: MoodLabel;
  rawScore: number;
}

export interface BusyInterval {
  start: Date;
  end: Date;
  label: string;
  taskId?: string;
}

export type CalendarOpKind = 'event_created' | 'event_updated' | 'event_deleted';

/**
 * Side effect of a task/calendar synchronization, relayed to callers as-is.
 */
export interface CalendarOp {
  op: CalendarOpKind;
  taskId: string;
  eventId: string;
  startTime?: string;
  label: string;
}
