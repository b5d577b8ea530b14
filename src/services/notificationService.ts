// src/services/notificationService.ts
import { formatLocalDate } from '../utils/timezone';
import type { MoodLabel, Task } from '../scheduling/types';

/**
 * Notification types that can be sent
 */
export enum NotificationType {
  TASK_RESCHEDULED = 'task_rescheduled',
  SCHEDULE_DEGRADED = 'schedule_degraded',
  TASK_UNSCHEDULED = 'task_unscheduled',
  PRIORITIES_SHIFTED = 'priorities_shifted'
}

/**
 * Notification severity levels for UI styling
 */
export enum NotificationSeverity {
  INFO = 'info',
  WARNING = 'warning',
  SUCCESS = 'success'
}

export interface NotificationAction {
  label: string;
  action: string;
  variant?: 'primary' | 'secondary';
  data?: Record<string, string>;
}

/**
 * Structured notification object for frontend consumption
 */
export interface NotificationMessage {
  id: string;
  type: NotificationType;
  severity: NotificationSeverity;
  title: string;
  message: string;
  timestamp: Date;
  taskId?: string;
  actions?: NotificationAction[];
  metadata?: {
    taskTitle?: string;
    oldTime?: string;
    newTime?: string;
    reason?: string;
    mood?: MoodLabel;
    changedTaskIds?: string[];
  };
}

export interface RescheduleNotice {
  taskId: string;
  taskTitle: string;
  /** ISO instant, or null when nothing was requested. */
  oldTime: string | null;
  newTime: string;
  reason?: string;
}

export class NotificationService {
  private readonly timezone?: string;

  constructor(timezone?: string) {
    this.timezone = timezone;
  }

  notifyTaskRescheduled(notice: RescheduleNotice): NotificationMessage {
    const newTimeStr = this.formatTime(notice.newTime);
    const base = notice.oldTime
      ? `Task "${notice.taskTitle}" has been moved from ${this.formatTime(notice.oldTime)} to ${newTimeStr}`
      : `Task "${notice.taskTitle}" has been scheduled for ${newTimeStr}`;

    return this.record({
      type: NotificationType.TASK_RESCHEDULED,
      severity: NotificationSeverity.INFO,
      title: 'Task Rescheduled',
      message: notice.reason ? `${base}. Reason: ${notice.reason}` : base,
      taskId: notice.taskId,
      actions: [
        { label: 'View Task', action: 'view_task', variant: 'primary', data: { taskId: notice.taskId } },
        { label: 'Dismiss', action: 'dismiss', variant: 'secondary' }
      ],
      metadata: {
        taskTitle: notice.taskTitle,
        ...(notice.oldTime ? { oldTime: notice.oldTime } : {}),
        newTime: notice.newTime,
        ...(notice.reason ? { reason: notice.reason } : {})
      }
    });
  }

  /**
   * No free slot inside the search horizon; the task got a best-effort time.
   */
  notifyScheduleDegraded(taskId: string, taskTitle: string, time: string): NotificationMessage {
    return this.record({
      type: NotificationType.SCHEDULE_DEGRADED,
      severity: NotificationSeverity.WARNING,
      title: 'No Free Slot Found',
      message: `No free slot was found for "${taskTitle}". It was placed at ${this.formatTime(time)} and may overlap other entries.`,
      taskId,
      actions: [
        { label: 'Pick a Time', action: 'manual_schedule', variant: 'primary', data: { taskId } },
        { label: 'Dismiss', action: 'dismiss', variant: 'secondary' }
      ],
      metadata: { taskTitle, newTime: time, reason: 'search horizon exhausted' }
    });
  }

  notifyTaskUnscheduled(task: Pick<Task, 'id' | 'title'>, reason: string): NotificationMessage {
    return this.record({
      type: NotificationType.TASK_UNSCHEDULED,
      severity: NotificationSeverity.WARNING,
      title: 'Task Unscheduled',
      message: `Task "${task.title}" no longer has a time: ${reason}`,
      taskId: task.id,
      actions: [
        { label: 'Reschedule', action: 'reschedule_task', variant: 'primary', data: { taskId: task.id } }
      ],
      metadata: { taskTitle: task.title, reason }
    });
  }

  notifyPrioritiesShifted(mood: MoodLabel, changedTaskIds: string[]): NotificationMessage {
    const count = changedTaskIds.length;
    return this.record({
      type: NotificationType.PRIORITIES_SHIFTED,
      severity: NotificationSeverity.SUCCESS,
      title: 'Priorities Updated',
      message: `Mood "${mood}" changed the priority of ${count} task${count === 1 ? '' : 's'}`,
      metadata: { mood, changedTaskIds }
    });
  }

  private record(fields: Omit<NotificationMessage, 'id' | 'timestamp'>): NotificationMessage {
    const notification: NotificationMessage = {
      id: this.generateNotificationId(),
      timestamp: new Date(),
      ...fields
    };
    console.log(`[NotificationService] ${notification.type}`, {
      id: notification.id,
      taskId: notification.taskId
    });
    return notification;
  }

  private generateNotificationId(): string {
    return `notif_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private formatTime(iso: string): string {
    return this.timezone ? formatLocalDate(iso, 'YYYY-MM-DD HH:mm', this.timezone) : formatLocalDate(iso);
  }
}
