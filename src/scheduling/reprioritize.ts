import { HIGH_FOCUS_MOODS, LOW_ENERGY_MOODS } from '../constants';
import type { MoodLabel, MoodSignal, Priority, Task } from './types';

function isOneOf<T extends string>(values: readonly T[], label: string): label is T {
  return values.some(value => value === label);
}

export function reprioritize(task: Pick<Task, 'userPriority'>, mood: MoodSignal): Priority {
  if (isOneOf(LOW_ENERGY_MOODS, mood.label)) return 'low';
  if (isOneOf(HIGH_FOCUS_MOODS, mood.label)) return 'high';
  return task.userPriority;
}

export function priorityReason(mood: MoodLabel): string | null {
  if (isOneOf(LOW_ENERGY_MOODS, mood)) return 'low energy mood';
  if (isOneOf(HIGH_FOCUS_MOODS, mood)) return 'focus window';
  return null;
}

/**
 * Recolor the whole backlog for one mood reading. Returns new task objects;
 * applying the same signal again yields the same priorities.
 */
export function applyMoodToBacklog(mood: MoodSignal, tasks: readonly Task[]): Task[] {
  const reason = priorityReason(mood.label);
  return tasks.map(task => ({
    ...task,
    effectivePriority: reprioritize(task, mood),
    priorityReason: reason,
  }));
}

export function priorityChanged(before: Task, after: Task): boolean {
  return before.effectivePriority !== after.effectivePriority || before.priorityReason !== after.priorityReason;
}
