// src/models/index.ts
import mongoose, { Schema } from 'mongoose';
import { MAX_TASK_TITLE_LENGTH, MAX_ENTRY_DURATION, MIN_ENTRY_DURATION, UNSCHEDULED } from '../constants';
import { PRIORITIES, TASK_MODES, TASK_STATUSES } from '../scheduling/types';
import type { Priority, TaskMode, TaskStatus } from '../scheduling/types';

// Task Model
export interface ITask {
  title: string;
  mode: TaskMode;
  userPriority: Priority;
  effectivePriority: Priority;
  priorityReason?: string | null;
  scheduledTime: string;
  status: TaskStatus;
  createdAt: Date;
  updatedAt: Date;
}

const TaskSchema = new Schema<ITask>({
  title: { type: String, required: true, trim: true, maxlength: MAX_TASK_TITLE_LENGTH },
  mode: { type: String, enum: [...TASK_MODES], default: 'work' },
  userPriority: { type: String, enum: [...PRIORITIES], default: 'medium' },
  effectivePriority: { type: String, enum: [...PRIORITIES], default: 'medium' },
  priorityReason: { type: String, default: null },
  scheduledTime: { type: String, required: true, default: UNSCHEDULED },
  status: { type: String, enum: [...TASK_STATUSES], default: 'planned' }
}, { timestamps: true });

// Calendar Entry Model
export interface ICalendarEntry {
  label: string;
  start: Date;
  durationMinutes?: number;
  taskId?: string;
  createdAt: Date;
  updatedAt: Date;
}

const CalendarEntrySchema = new Schema<ICalendarEntry>({
  label: { type: String, required: true },
  start: { type: Date, required: true },
  durationMinutes: { type: Number, min: MIN_ENTRY_DURATION, max: MAX_ENTRY_DURATION },
  taskId: { type: String }
}, { timestamps: true });

// Create indexes
TaskSchema.index({ mode: 1, createdAt: -1 });
CalendarEntrySchema.index({ createdAt: -1 });
CalendarEntrySchema.index({ start: 1 });
// at most one entry per task
CalendarEntrySchema.index(
  { taskId: 1 },
  { unique: true, partialFilterExpression: { taskId: { $type: 'string' } } }
);

export const TaskModel = mongoose.model<ITask>('Task', TaskSchema);
export const CalendarEntryModel = mongoose.model<ICalendarEntry>('CalendarEntry', CalendarEntrySchema);
