import { describe, it, expect } from "vitest";
import { NotificationService, NotificationSeverity, NotificationType } from "../src/services/notificationService";

describe("NotificationService", () => {
  const service = new NotificationService("Europe/Berlin");

  it("formats reschedules in the user's timezone", () => {
    const notification = service.notifyTaskRescheduled({
      taskId: "task-1",
      taskTitle: "Write report",
      oldTime: "2024-06-15T07:00:00.000Z",
      newTime: "2024-06-15T07:30:00.000Z",
    });

    expect(notification.type).toBe(NotificationType.TASK_RESCHEDULED);
    expect(notification.message).toBe('Task "Write report" has been moved from 2024-06-15 09:00 to 2024-06-15 09:30');
    expect(notification.id).toMatch(/^notif_\d+_/);
  });

  it("describes a first placement without an old time", () => {
    const notification = service.notifyTaskRescheduled({
      taskId: "task-1",
      taskTitle: "Stretch",
      oldTime: null,
      newTime: "2024-06-15T07:30:00.000Z",
    });
    expect(notification.message).toBe('Task "Stretch" has been scheduled for 2024-06-15 09:30');
    expect(notification.metadata?.oldTime).toBeUndefined();
  });

  it("warns when the search horizon was exhausted", () => {
    const notification = service.notifyScheduleDegraded("task-2", "Deep work", "2024-06-15T20:00:00.000Z");
    expect(notification.severity).toBe(NotificationSeverity.WARNING);
    expect(notification.message).toBe(
      'No free slot was found for "Deep work". It was placed at 2024-06-15 22:00 and may overlap other entries.',
    );
  });

  it("counts shifted priorities", () => {
    expect(service.notifyPrioritiesShifted("tired", ["a"]).message).toBe('Mood "tired" changed the priority of 1 task');
    expect(service.notifyPrioritiesShifted("focused", ["a", "b"]).message).toBe('Mood "focused" changed the priority of 2 tasks');
  });
});
