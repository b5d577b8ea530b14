// src/stores/calendarStore.ts
import { escapeRegExp } from 'lodash';
import mongoose, { Types } from 'mongoose';
import { CalendarEntryModel, ICalendarEntry } from '../models';
import { taskLabelPrefix } from '../scheduling/intervals';
import type { CalendarEntry } from '../scheduling/types';

export interface NewCalendarEntry {
  label: string;
  start: Date;
  durationMinutes?: number;
  taskId?: string;
}

export type CalendarEntryPatch = Partial<Pick<CalendarEntry, 'label' | 'start' | 'durationMinutes' | 'taskId'>>;

/**
 * Persistence boundary for calendar entries.
 */
export interface CalendarStore {
  /** Most recently created entries first. */
  listRecentEntries(limit: number): Promise<CalendarEntry[]>;
  /**
   * Entries owned by a task, oldest first. Entries written without an owner
   * reference are matched by their `Task#<id> ` label prefix.
   */
  findEntriesForTask(taskId: string): Promise<CalendarEntry[]>;
  createEntry(entry: NewCalendarEntry): Promise<CalendarEntry>;
  updateEntry(id: string, patch: CalendarEntryPatch): Promise<CalendarEntry | null>;
  deleteEntry(id: string): Promise<CalendarEntry | null>;
}

type CalendarEntryDoc = ICalendarEntry & { _id: Types.ObjectId };

export function toCalendarEntry(doc: CalendarEntryDoc): CalendarEntry {
  return {
    id: doc._id.toString(),
    label: doc.label,
    start: new Date(doc.start),
    ...(typeof doc.durationMinutes === 'number' ? { durationMinutes: doc.durationMinutes } : {}),
    ...(doc.taskId ? { taskId: doc.taskId } : {}),
    createdAt: doc.createdAt ? new Date(doc.createdAt) : new Date(0),
  };
}

export class MongoCalendarStore implements CalendarStore {
  async listRecentEntries(limit: number): Promise<CalendarEntry[]> {
    const docs = await CalendarEntryModel.find({}).sort({ createdAt: -1, _id: -1 }).limit(limit);
    return docs.map(toCalendarEntry);
  }

  async findEntriesForTask(taskId: string): Promise<CalendarEntry[]> {
    const docs = await CalendarEntryModel.find({
      $or: [
        { taskId },
        { taskId: { $exists: false }, label: { $regex: `^${escapeRegExp(taskLabelPrefix(taskId))}` } }
      ]
    }).sort({ createdAt: 1, _id: 1 });
    return docs.map(toCalendarEntry);
  }

  async createEntry(entry: NewCalendarEntry): Promise<CalendarEntry> {
    const doc = await CalendarEntryModel.create(entry);
    return toCalendarEntry(doc);
  }

  async updateEntry(id: string, patch: CalendarEntryPatch): Promise<CalendarEntry | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await CalendarEntryModel.findByIdAndUpdate(id, patch, { new: true, runValidators: true });
    return doc ? toCalendarEntry(doc) : null;
  }

  async deleteEntry(id: string): Promise<CalendarEntry | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await CalendarEntryModel.findByIdAndDelete(id);
    return doc ? toCalendarEntry(doc) : null;
  }
}
