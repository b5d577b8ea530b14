// test/test-utilities.ts

import type { SchedulerSettings } from "../src/config";
import { overlaps, taskLabelPrefix } from "../src/scheduling/intervals";
import type { BusyInterval, CalendarEntry, Task } from "../src/scheduling/types";
import type { CalendarEntryPatch, CalendarStore, NewCalendarEntry } from "../src/stores/calendarStore";
import type { NewTask, TaskFilter, TaskPatch, TaskStore } from "../src/stores/taskStore";

export const TEST_DAY = "2024-06-15";

/**
 * UTC instant on the test day (or another day), e.g. at("09:30").
 */
export function at(time: string, day: string = TEST_DAY): Date {
  return new Date(`${day}T${time}:00.000Z`);
}

export function iso(time: string, day: string = TEST_DAY): string {
  return at(time, day).toISOString();
}

export function busy(label: string, from: string, to: string, taskId?: string): BusyInterval {
  return { start: at(from), end: at(to), label, ...(taskId ? { taskId } : {}) };
}

export const TEST_SETTINGS: SchedulerSettings = {
  blockMinutes: 15,
  horizonHours: 12,
  meetingBufferMinutes: 20,
  calendarQueryLimit: 80,
  timezone: "UTC",
};

export function createTestTask(overrides: Partial<Task> = {}): Task {
  return {
    id: "task-1",
    title: "Test Task",
    mode: "work",
    userPriority: "medium",
    effectivePriority: "medium",
    priorityReason: null,
    scheduledTime: "unscheduled",
    status: "planned",
    createdAt: new Date(0),
    ...overrides,
  };
}

export function createTestEntry(overrides: Partial<CalendarEntry> = {}): CalendarEntry {
  return {
    id: "entry-1",
    label: "Test Entry",
    start: at("09:00"),
    createdAt: new Date(0),
    ...overrides,
  };
}

/**
 * Pairs of intervals that intersect; empty when the set is conflict-free.
 */
export function findOverlaps(intervals: BusyInterval[]): Array<[BusyInterval, BusyInterval]> {
  const pairs: Array<[BusyInterval, BusyInterval]> = [];
  intervals.forEach((a, i) => {
    intervals.slice(i + 1).forEach(b => {
      if (overlaps(a, b)) pairs.push([a, b]);
    });
  });
  return pairs;
}

interface Stored<T> {
  seq: number;
  value: T;
}

export class InMemoryCalendarStore implements CalendarStore {
  private rows: Array<Stored<CalendarEntry>> = [];
  private seq = 0;

  seed(entry: NewCalendarEntry): CalendarEntry {
    const row = this.insert(entry);
    return { ...row };
  }

  all(): CalendarEntry[] {
    return this.rows.map(row => ({ ...row.value }));
  }

  async listRecentEntries(limit: number): Promise<CalendarEntry[]> {
    return [...this.rows]
      .sort((a, b) => b.seq - a.seq)
      .slice(0, limit)
      .map(row => ({ ...row.value }));
  }

  async findEntriesForTask(taskId: string): Promise<CalendarEntry[]> {
    const prefix = taskLabelPrefix(taskId);
    return this.rows
      .filter(row => row.value.taskId === taskId || (!row.value.taskId && row.value.label.startsWith(prefix)))
      .map(row => ({ ...row.value }));
  }

  async createEntry(entry: NewCalendarEntry): Promise<CalendarEntry> {
    return { ...this.insert(entry) };
  }

  async updateEntry(id: string, patch: CalendarEntryPatch): Promise<CalendarEntry | null> {
    const row = this.rows.find(candidate => candidate.value.id === id);
    if (!row) return null;
    row.value = { ...row.value, ...patch };
    return { ...row.value };
  }

  async deleteEntry(id: string): Promise<CalendarEntry | null> {
    const row = this.rows.find(candidate => candidate.value.id === id);
    if (!row) return null;
    this.rows = this.rows.filter(candidate => candidate !== row);
    return { ...row.value };
  }

  private insert(entry: NewCalendarEntry): CalendarEntry {
    this.seq += 1;
    const value: CalendarEntry = { ...entry, id: `entry-${this.seq}`, createdAt: new Date() };
    this.rows.push({ seq: this.seq, value });
    return value;
  }
}

export class InMemoryTaskStore implements TaskStore {
  private rows: Array<Stored<Task>> = [];
  private seq = 0;

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    return [...this.rows]
      .sort((a, b) => b.seq - a.seq)
      .filter(row => !filter.mode || row.value.mode === filter.mode)
      .map(row => ({ ...row.value }));
  }

  async getTask(id: string): Promise<Task | null> {
    const row = this.rows.find(candidate => candidate.value.id === id);
    return row ? { ...row.value } : null;
  }

  async createTask(task: NewTask): Promise<Task> {
    this.seq += 1;
    const value: Task = { ...task, id: `task-${this.seq}`, createdAt: new Date() };
    this.rows.push({ seq: this.seq, value });
    return { ...value };
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task | null> {
    const row = this.rows.find(candidate => candidate.value.id === id);
    if (!row) return null;
    row.value = { ...row.value, ...patch };
    return { ...row.value };
  }

  async deleteTask(id: string): Promise<Task | null> {
    const row = this.rows.find(candidate => candidate.value.id === id);
    if (!row) return null;
    this.rows = this.rows.filter(candidate => candidate !== row);
    return { ...row.value };
  }
}

export default {
  at,
  iso,
  busy,
  createTestTask,
  createTestEntry,
  findOverlaps,
  TEST_SETTINGS,
  TEST_DAY,
};
