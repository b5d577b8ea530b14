// src/services/calendarSyncService.ts
import { DEFAULT_TASK_DURATION } from '../constants';
import { clampDuration, entryDuration, formatEntryLabel } from '../scheduling/intervals';
import { parseScheduledTime } from '../scheduling/time';
import type { CalendarEntry, CalendarOp, Task } from '../scheduling/types';
import type { CalendarStore } from '../stores/calendarStore';

export type SyncableTask = Pick<Task, 'id' | 'title' | 'scheduledTime'>;

function toOp(op: CalendarOp['op'], taskId: string, entry: CalendarEntry): CalendarOp {
  return {
    op,
    taskId,
    eventId: entry.id,
    ...(op === 'event_deleted' ? {} : { startTime: entry.start.toISOString() }),
    label: entry.label
  };
}

/**
 * Keeps each task's calendar entry in step with its scheduled time.
 * A task owns at most one entry; extra matches are deleted on every sync.
 */
export class CalendarSyncService {
  private calendarStore: CalendarStore;

  constructor(calendarStore: CalendarStore) {
    this.calendarStore = calendarStore;
  }

  async syncTask(task: SyncableTask, durationMinutes: number = DEFAULT_TASK_DURATION): Promise<CalendarOp[]> {
    const ops: CalendarOp[] = [];
    const [current, ...duplicates] = await this.calendarStore.findEntriesForTask(task.id);

    for (const duplicate of duplicates) {
      const deleted = await this.calendarStore.deleteEntry(duplicate.id);
      if (deleted) ops.push(toOp('event_deleted', task.id, deleted));
    }
    if (duplicates.length > 0) {
      console.log('[CalendarSyncService] Removed duplicate entries', { taskId: task.id, count: duplicates.length });
    }

    const start = parseScheduledTime(task.scheduledTime);

    if (!start) {
      if (current) {
        const deleted = await this.calendarStore.deleteEntry(current.id);
        if (deleted) {
          console.log('[CalendarSyncService] Deleted entry for unscheduled task', { taskId: task.id, eventId: deleted.id });
          ops.push(toOp('event_deleted', task.id, deleted));
        }
      }
      return ops;
    }

    const duration = clampDuration(Math.round(Number.isFinite(durationMinutes) ? durationMinutes : DEFAULT_TASK_DURATION));
    const label = formatEntryLabel(task.id, task.title, duration);

    if (current && this.isInSync(current, task.id, start, label, duration)) {
      return ops;
    }

    if (current) {
      const updated = await this.calendarStore.updateEntry(current.id, {
        label,
        start,
        durationMinutes: duration,
        taskId: task.id
      });
      if (updated) {
        console.log('[CalendarSyncService] Updated entry', { taskId: task.id, eventId: updated.id, start: start.toISOString() });
        ops.push(toOp('event_updated', task.id, updated));
        return ops;
      }
      console.log('[CalendarSyncService] Entry vanished before update, recreating', { taskId: task.id, eventId: current.id });
    }

    const created = await this.calendarStore.createEntry({ label, start, durationMinutes: duration, taskId: task.id });
    console.log('[CalendarSyncService] Created entry', { taskId: task.id, eventId: created.id, start: start.toISOString() });
    ops.push(toOp('event_created', task.id, created));
    return ops;
  }

  /**
   * Delete every entry owned by a task that no longer exists.
   */
  async removeForTask(taskId: string): Promise<CalendarOp[]> {
    const ops: CalendarOp[] = [];
    const entries = await this.calendarStore.findEntriesForTask(taskId);
    for (const entry of entries) {
      const deleted = await this.calendarStore.deleteEntry(entry.id);
      if (deleted) ops.push(toOp('event_deleted', taskId, deleted));
    }
    if (ops.length > 0) {
      console.log('[CalendarSyncService] Removed entries of deleted task', { taskId, count: ops.length });
    }
    return ops;
  }

  private isInSync(entry: CalendarEntry, taskId: string, start: Date, label: string, duration: number): boolean {
    return entry.taskId === taskId
      && entry.start.getTime() === start.getTime()
      && entry.label === label
      && entryDuration(entry) === duration;
  }
}
