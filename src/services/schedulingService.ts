// src/services/schedulingService.ts
import { addMinutes, differenceInMinutes } from 'date-fns';
import { config, SchedulerSettings } from '../config';
import {
  DEFAULT_STAGGER_OFFSETS,
  DEFAULT_TASK_DURATION,
  LOW_INTENSITY_TASK_DURATION,
  MAX_ENTRY_TITLE_LENGTH,
  MAX_STAGGER_OFFSETS,
  MAX_TASK_TITLE_LENGTH,
  UNSCHEDULED
} from '../constants';
import {
  applyMoodToBacklog as recolorBacklog,
  entryDuration,
  generateStaggeredSlots,
  hasConflict,
  isLowIntensityTitle,
  normalizeTitle,
  priorityChanged,
  resolveConflict,
  sortBusyIntervals,
  taskIdFromLabel,
  toBusyInterval,
  withReservation
} from '../scheduling';
import type { ConflictOptions } from '../scheduling';
import { parseScheduledTime } from '../scheduling/time';
import type {
  BusyInterval,
  CalendarEntry,
  CalendarOp,
  MoodSignal,
  Priority,
  Task,
  TaskMode,
  TaskStatus
} from '../scheduling/types';
import { CalendarStore, MongoCalendarStore } from '../stores/calendarStore';
import { MongoTaskStore, TaskPatch, TaskStore } from '../stores/taskStore';
import { parseDesiredTime } from '../utils/desiredTime';
import { CalendarSyncService } from './calendarSyncService';
import { NotificationMessage, NotificationService } from './notificationService';

export interface ResolveScheduleResult {
  /** ISO instant, or "unscheduled". */
  finalTime: string;
  changed: boolean;
  degraded: boolean;
}

export interface CreateTaskInput {
  title: string;
  mode?: TaskMode;
  userPriority?: Priority;
  /** Desired time: ISO-8601 or a phrase such as "tomorrow at 3pm". */
  scheduledTime?: string;
  durationMinutes?: number;
  /** Place a task with no desired time at the next free slot. Defaults to true. */
  autoSchedule?: boolean;
}

export interface UpdateTaskInput {
  title?: string;
  mode?: TaskMode;
  userPriority?: Priority;
  scheduledTime?: string;
  status?: TaskStatus;
  durationMinutes?: number;
}

export interface TaskMutationResult {
  task: Task;
  schedule?: ResolveScheduleResult;
  calendarOps: CalendarOp[];
  notifications: NotificationMessage[];
}

export interface PlanItem {
  title: string;
  desiredTimeText?: string;
  durationMinutes?: number;
  mode?: TaskMode;
  userPriority?: Priority;
  /** Offer alternatives when there is no desired time; the first one is used. */
  staggerOffsets?: number[];
}

export interface PlanRequest {
  items: PlanItem[];
  mood?: MoodSignal;
}

export interface RescheduledItem {
  id: string;
  title: string;
  to: string;
}

export interface PlanResult {
  tasks: Task[];
  rescheduled: RescheduledItem[];
  candidates: Array<{ taskId: string; slots: string[] }>;
  calendarOps: CalendarOp[];
  notifications: NotificationMessage[];
}

export interface MoodApplication {
  tasks: Task[];
  changedTaskIds: string[];
  notifications: NotificationMessage[];
}

export type CalendarEntryView = CalendarEntry & { durationMinutes: number; end: Date };

export interface NewManualEntry {
  label: string;
  start: Date;
  durationMinutes?: number;
}

export interface EntryCreationResult {
  entry: CalendarEntryView;
  rescheduled: RescheduledItem[];
  calendarOps: CalendarOp[];
  notifications: NotificationMessage[];
}

export interface EntryDeletionResult {
  entry: CalendarEntryView;
  task?: Task;
  calendarOps: CalendarOp[];
  notifications: NotificationMessage[];
}

interface Resolution extends ResolveScheduleResult {
  requested: Date | null;
}

export function defaultDurationFor(title: string): number {
  return isLowIntensityTitle(title) ? LOW_INTENSITY_TASK_DURATION : DEFAULT_TASK_DURATION;
}

function toEntryView(entry: CalendarEntry): CalendarEntryView {
  const durationMinutes = entryDuration(entry);
  return { ...entry, durationMinutes, end: addMinutes(entry.start, durationMinutes) };
}

function isUnscheduledText(text: string): boolean {
  return text.trim().toLowerCase() === UNSCHEDULED;
}

/**
 * Orchestrates the scheduling engine over the task and calendar stores.
 * Each operation reads the busy set once and works on that snapshot.
 */
export class SchedulingService {
  private calendarStore: CalendarStore;
  private taskStore: TaskStore;
  private settings: SchedulerSettings;
  private notificationService: NotificationService;
  private calendarSync: CalendarSyncService;

  constructor(
    calendarStore: CalendarStore = new MongoCalendarStore(),
    taskStore: TaskStore = new MongoTaskStore(),
    settings: SchedulerSettings = config.scheduler,
    notificationService: NotificationService = new NotificationService(settings.timezone)
  ) {
    this.calendarStore = calendarStore;
    this.taskStore = taskStore;
    this.settings = settings;
    this.notificationService = notificationService;
    this.calendarSync = new CalendarSyncService(calendarStore);
  }

  async loadBusyIntervals(): Promise<BusyInterval[]> {
    const entries = await this.calendarStore.listRecentEntries(this.settings.calendarQueryLimit);
    return sortBusyIntervals(entries.map(toBusyInterval));
  }

  async resolveSchedule(
    desiredTimeText?: string,
    durationMinutes: number = DEFAULT_TASK_DURATION,
    avoidNaps: boolean = false,
    autoSchedule: boolean = true
  ): Promise<ResolveScheduleResult> {
    const busy = await this.loadBusyIntervals();
    const { finalTime, changed, degraded } = this.resolveAgainst(busy, desiredTimeText, {
      durationMinutes,
      avoidNaps,
      autoSchedule,
      now: new Date()
    });
    return { finalTime, changed, degraded };
  }

  async suggestSlots(
    baseTime?: string,
    offsetsMinutes: readonly number[] = DEFAULT_STAGGER_OFFSETS,
    durationMinutes: number = DEFAULT_TASK_DURATION,
    avoidNaps: boolean = false
  ): Promise<string[]> {
    const now = new Date();
    const base = parseDesiredTime(baseTime, { now, timezone: this.settings.timezone }) ?? now;
    const busy = await this.loadBusyIntervals();
    const slots = generateStaggeredSlots(
      busy,
      base,
      offsetsMinutes.slice(0, MAX_STAGGER_OFFSETS),
      this.searchOptions(durationMinutes, avoidNaps)
    );
    return slots.map(slot => slot.toISOString());
  }

  async syncTaskCalendar(task: Task, durationMinutes: number = DEFAULT_TASK_DURATION): Promise<CalendarOp[]> {
    return this.calendarSync.syncTask(task, durationMinutes);
  }

  /**
   * Recolor every stored task for one mood reading. Only tasks whose effective
   * priority or reason moved are written back.
   */
  async applyMoodToBacklog(mood: MoodSignal): Promise<MoodApplication> {
    const before = await this.taskStore.listTasks();
    const after = recolorBacklog(mood, before);
    const changedTaskIds: string[] = [];

    const tasks: Task[] = [];
    for (const [index, task] of after.entries()) {
      if (!priorityChanged(before[index], task)) {
        tasks.push(task);
        continue;
      }
      const saved = await this.taskStore.updateTask(task.id, {
        effectivePriority: task.effectivePriority,
        priorityReason: task.priorityReason
      });
      changedTaskIds.push(task.id);
      tasks.push(saved ?? task);
    }

    console.log('[SchedulingService] Applied mood to backlog', {
      mood: mood.label,
      total: tasks.length,
      changed: changedTaskIds.length
    });

    const notifications = changedTaskIds.length > 0
      ? [this.notificationService.notifyPrioritiesShifted(mood.label, changedTaskIds)]
      : [];
    return { tasks, changedTaskIds, notifications };
  }

  async listTasks(mode?: TaskMode): Promise<Task[]> {
    return this.taskStore.listTasks(mode ? { mode } : {});
  }

  async getTask(id: string): Promise<Task | null> {
    return this.taskStore.getTask(id);
  }

  async createTask(input: CreateTaskInput): Promise<TaskMutationResult> {
    const title = normalizeTitle(input.title, MAX_TASK_TITLE_LENGTH);
    const durationMinutes = input.durationMinutes ?? defaultDurationFor(title);
    const busy = await this.loadBusyIntervals();

    const resolution = this.resolveAgainst(busy, input.scheduledTime, {
      durationMinutes,
      avoidNaps: isLowIntensityTitle(title),
      autoSchedule: input.autoSchedule ?? true,
      now: new Date()
    });

    const userPriority = input.userPriority ?? 'medium';
    const task = await this.taskStore.createTask({
      title,
      mode: input.mode ?? 'work',
      userPriority,
      effectivePriority: userPriority,
      priorityReason: null,
      scheduledTime: resolution.finalTime,
      status: 'planned'
    });
    console.log('[SchedulingService] Created task', { id: task.id, scheduledTime: task.scheduledTime });

    const calendarOps = await this.calendarSync.syncTask(task, durationMinutes);
    return {
      task,
      schedule: this.publicResult(resolution),
      calendarOps,
      notifications: this.resolutionNotices(task, resolution)
    };
  }

  async updateTask(id: string, input: UpdateTaskInput): Promise<TaskMutationResult | null> {
    const existing = await this.taskStore.getTask(id);
    if (!existing) return null;

    const title = input.title !== undefined ? normalizeTitle(input.title, MAX_TASK_TITLE_LENGTH) : existing.title;
    const durationMinutes = input.durationMinutes ?? await this.recordedDuration(id);
    const patch: TaskPatch = {};

    if (input.title !== undefined) patch.title = title;
    if (input.mode !== undefined) patch.mode = input.mode;
    if (input.status !== undefined) patch.status = input.status;
    if (input.userPriority !== undefined) {
      patch.userPriority = input.userPriority;
      patch.effectivePriority = input.userPriority;
      patch.priorityReason = null;
    }

    let resolution: Resolution | undefined;
    const desiredText = input.scheduledTime ?? (input.durationMinutes !== undefined ? existing.scheduledTime : undefined);

    if (desiredText !== undefined && isUnscheduledText(desiredText)) {
      patch.scheduledTime = UNSCHEDULED;
    } else if (desiredText !== undefined) {
      const busy = await this.loadBusyIntervals();
      resolution = this.resolveAgainst(busy, desiredText, {
        durationMinutes,
        avoidNaps: isLowIntensityTitle(title),
        autoSchedule: true,
        excludeTaskId: id,
        now: new Date()
      });
      patch.scheduledTime = resolution.finalTime;
    }

    const task = await this.taskStore.updateTask(id, patch);
    if (!task) return null;
    console.log('[SchedulingService] Updated task', { id, fields: Object.keys(patch) });

    const calendarOps = await this.calendarSync.syncTask(task, durationMinutes);
    return {
      task,
      ...(resolution ? { schedule: this.publicResult(resolution) } : {}),
      calendarOps,
      notifications: resolution ? this.resolutionNotices(task, resolution) : []
    };
  }

  async deleteTask(id: string): Promise<{ task: Task; calendarOps: CalendarOp[] } | null> {
    const task = await this.taskStore.deleteTask(id);
    if (!task) return null;
    console.log('[SchedulingService] Deleted task', { id });
    const calendarOps = await this.calendarSync.removeForTask(id);
    return { task, calendarOps };
  }

  /**
   * Place an existing task at the next free slot from now, ignoring its own entry.
   */
  async rescheduleTask(id: string, durationMinutes?: number): Promise<TaskMutationResult | null> {
    const existing = await this.taskStore.getTask(id);
    if (!existing) return null;

    const duration = durationMinutes ?? await this.recordedDuration(id);
    const busy = await this.loadBusyIntervals();
    const now = new Date();
    const { time, degraded } = resolveConflict(null, busy, {
      ...this.searchOptions(duration, isLowIntensityTitle(existing.title), id),
      now
    });
    const finalTime = time.toISOString();
    const resolution: Resolution = {
      finalTime,
      changed: finalTime !== existing.scheduledTime,
      degraded,
      requested: parseScheduledTime(existing.scheduledTime)
    };

    const task = await this.taskStore.updateTask(id, { scheduledTime: finalTime });
    if (!task) return null;
    console.log('[SchedulingService] Rescheduled task', { id, from: existing.scheduledTime, to: finalTime });

    const calendarOps = await this.calendarSync.syncTask(task, duration);
    return {
      task,
      schedule: this.publicResult(resolution),
      calendarOps,
      notifications: this.resolutionNotices(task, resolution, 'rescheduled on request')
    };
  }

  /**
   * Create several tasks against one busy snapshot. Each placement is reserved
   * in the snapshot before the next item is resolved.
   */
  async planTasks(request: PlanRequest): Promise<PlanResult> {
    const now = new Date();
    let busy = await this.loadBusyIntervals();

    const tasks: Task[] = [];
    const rescheduled: RescheduledItem[] = [];
    const candidates: PlanResult['candidates'] = [];
    const calendarOps: CalendarOp[] = [];
    const notifications: NotificationMessage[] = [];

    for (const item of request.items) {
      const title = normalizeTitle(item.title, MAX_TASK_TITLE_LENGTH);
      if (!title) continue;

      const avoidNaps = isLowIntensityTitle(title);
      const durationMinutes = item.durationMinutes ?? defaultDurationFor(title);
      const hasDesiredTime = !!item.desiredTimeText && parseDesiredTime(item.desiredTimeText, {
        now,
        timezone: this.settings.timezone
      }) !== null;

      let slots: Date[] = [];
      if (!hasDesiredTime && item.staggerOffsets && item.staggerOffsets.length > 0) {
        slots = generateStaggeredSlots(
          busy,
          now,
          item.staggerOffsets.slice(0, MAX_STAGGER_OFFSETS),
          this.searchOptions(durationMinutes, avoidNaps)
        );
      }

      const options = { durationMinutes, avoidNaps, autoSchedule: true, now };
      const resolution = slots.length > 0
        ? this.resolveAgainst(busy, slots[0].toISOString(), options)
        : this.resolveAgainst(busy, item.desiredTimeText, options);

      const userPriority = item.userPriority ?? 'medium';
      const task = await this.taskStore.createTask({
        title,
        mode: item.mode ?? 'work',
        userPriority,
        effectivePriority: userPriority,
        priorityReason: null,
        scheduledTime: resolution.finalTime,
        status: 'planned'
      });
      tasks.push(task);
      calendarOps.push(...await this.calendarSync.syncTask(task, durationMinutes));

      const start = parseScheduledTime(task.scheduledTime);
      if (start) {
        busy = withReservation(busy, {
          start,
          end: addMinutes(start, durationMinutes),
          label: normalizeTitle(title, MAX_ENTRY_TITLE_LENGTH),
          taskId: task.id
        });
      }

      if (hasDesiredTime && resolution.changed) {
        rescheduled.push({ id: task.id, title: task.title, to: resolution.finalTime });
      }
      if (slots.length > 0) {
        candidates.push({ taskId: task.id, slots: slots.map(slot => slot.toISOString()) });
      }
      notifications.push(...this.resolutionNotices(task, resolution));
    }

    console.log('[SchedulingService] Planned tasks', { created: tasks.length, rescheduled: rescheduled.length });

    if (request.mood) {
      const applied = await this.applyMoodToBacklog(request.mood);
      const byId = new Map(applied.tasks.map(task => [task.id, task]));
      notifications.push(...applied.notifications);
      return {
        tasks: tasks.map(task => byId.get(task.id) ?? task),
        rescheduled,
        candidates,
        calendarOps,
        notifications
      };
    }

    return { tasks, rescheduled, candidates, calendarOps, notifications };
  }

  async listEntries(): Promise<CalendarEntryView[]> {
    const entries = await this.calendarStore.listRecentEntries(this.settings.calendarQueryLimit);
    return entries.map(toEntryView);
  }

  /**
   * Add a manual entry, then move every scheduled task that now collides with it
   * to the next free slot after its current time.
   */
  async createEntry(input: NewManualEntry): Promise<EntryCreationResult> {
    const entry = await this.calendarStore.createEntry({
      label: normalizeTitle(input.label, MAX_ENTRY_TITLE_LENGTH),
      start: input.start,
      ...(input.durationMinutes !== undefined ? { durationMinutes: input.durationMinutes } : {})
    });
    console.log('[SchedulingService] Created calendar entry', { id: entry.id, start: entry.start.toISOString() });

    const blocking = toBusyInterval(entry);
    let busy = await this.loadBusyIntervals();
    const tasks = await this.taskStore.listTasks();

    const affected = tasks
      .map(task => ({ task, interval: busy.find(interval => interval.taskId === task.id) }))
      .filter((candidate): candidate is { task: Task; interval: BusyInterval } => {
        const { task, interval } = candidate;
        if (!interval || task.status === 'completed') return false;
        return hasConflict(
          interval.start,
          [blocking],
          this.searchOptions(differenceInMinutes(interval.end, interval.start), isLowIntensityTitle(task.title))
        );
      })
      .sort((a, b) => a.interval.start.getTime() - b.interval.start.getTime());

    const rescheduled: RescheduledItem[] = [];
    const calendarOps: CalendarOp[] = [];
    const notifications: NotificationMessage[] = [];

    for (const { task, interval } of affected) {
      const durationMinutes = differenceInMinutes(interval.end, interval.start);
      const { time, changed, degraded } = resolveConflict(interval.start, busy, {
        ...this.searchOptions(durationMinutes, isLowIntensityTitle(task.title), task.id),
        now: new Date()
      });
      if (!changed) continue;

      const finalTime = time.toISOString();
      const updated = await this.taskStore.updateTask(task.id, { scheduledTime: finalTime });
      if (!updated) continue;

      calendarOps.push(...await this.calendarSync.syncTask(updated, durationMinutes));
      busy = withReservation(
        busy.filter(busyInterval => busyInterval.taskId !== task.id),
        { start: time, end: addMinutes(time, durationMinutes), label: interval.label, taskId: task.id }
      );
      rescheduled.push({ id: task.id, title: task.title, to: finalTime });
      notifications.push(...this.resolutionNotices(updated, {
        finalTime,
        changed,
        degraded,
        requested: interval.start
      }, `conflicts with "${entry.label}"`));
    }

    if (rescheduled.length > 0) {
      console.log('[SchedulingService] Moved tasks out of new entry', { entryId: entry.id, count: rescheduled.length });
    }
    return { entry: toEntryView(entry), rescheduled, calendarOps, notifications };
  }

  /**
   * Delete an entry. When it belongs to a task, that task becomes unscheduled.
   */
  async deleteEntry(id: string): Promise<EntryDeletionResult | null> {
    const entry = await this.calendarStore.deleteEntry(id);
    if (!entry) return null;
    console.log('[SchedulingService] Deleted calendar entry', { id });

    const ownerId = entry.taskId ?? taskIdFromLabel(entry.label);
    if (!ownerId) {
      return { entry: toEntryView(entry), calendarOps: [], notifications: [] };
    }
    const calendarOps: CalendarOp[] = [{ op: 'event_deleted', taskId: ownerId, eventId: entry.id, label: entry.label }];

    const owner = await this.taskStore.getTask(ownerId);
    if (!owner || owner.scheduledTime === UNSCHEDULED) {
      return { entry: toEntryView(entry), calendarOps, notifications: [] };
    }

    const task = await this.taskStore.updateTask(ownerId, { scheduledTime: UNSCHEDULED });
    if (!task) {
      return { entry: toEntryView(entry), calendarOps, notifications: [] };
    }
    calendarOps.push(...await this.calendarSync.syncTask(task));
    return {
      entry: toEntryView(entry),
      task,
      calendarOps,
      notifications: [this.notificationService.notifyTaskUnscheduled(task, 'its calendar entry was deleted')]
    };
  }

  private searchOptions(durationMinutes: number, avoidNaps: boolean, excludeTaskId?: string): ConflictOptions {
    return {
      blockMinutes: this.settings.blockMinutes,
      horizonHours: this.settings.horizonHours,
      meetingBufferMinutes: this.settings.meetingBufferMinutes,
      durationMinutes,
      avoidNaps,
      ...(excludeTaskId ? { excludeTaskId } : {})
    };
  }

  private resolveAgainst(
    busy: readonly BusyInterval[],
    desiredTimeText: string | undefined,
    options: { durationMinutes: number; avoidNaps: boolean; autoSchedule: boolean; now: Date; excludeTaskId?: string }
  ): Resolution {
    const requested = parseDesiredTime(desiredTimeText, { now: options.now, timezone: this.settings.timezone });
    if (!requested && !options.autoSchedule) {
      return { finalTime: UNSCHEDULED, changed: false, degraded: false, requested: null };
    }

    const { time, changed, degraded } = resolveConflict(requested, busy, {
      ...this.searchOptions(options.durationMinutes, options.avoidNaps, options.excludeTaskId),
      now: options.now
    });
    return { finalTime: time.toISOString(), changed, degraded, requested };
  }

  private publicResult({ finalTime, changed, degraded }: Resolution): ResolveScheduleResult {
    return { finalTime, changed, degraded };
  }

  private resolutionNotices(task: Task, resolution: Resolution, reason?: string): NotificationMessage[] {
    const notices: NotificationMessage[] = [];
    if (resolution.requested && resolution.changed && resolution.finalTime !== UNSCHEDULED) {
      notices.push(this.notificationService.notifyTaskRescheduled({
        taskId: task.id,
        taskTitle: task.title,
        oldTime: resolution.requested.toISOString(),
        newTime: resolution.finalTime,
        reason: reason ?? 'requested time was busy'
      }));
    }
    if (resolution.degraded) {
      notices.push(this.notificationService.notifyScheduleDegraded(task.id, task.title, resolution.finalTime));
    }
    return notices;
  }

  /**
   * Duration recorded on the task's entry, or the default when it has none.
   */
  private async recordedDuration(taskId: string): Promise<number> {
    const [entry] = await this.calendarStore.findEntriesForTask(taskId);
    return entry ? entryDuration(entry) : DEFAULT_TASK_DURATION;
  }
}
