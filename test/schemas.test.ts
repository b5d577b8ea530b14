import { describe, it, expect } from "vitest";
import {
  createEntrySchema,
  createTaskSchema,
  moodSignalSchema,
  planTasksSchema,
  resolveScheduleSchema,
  suggestSlotsSchema,
  updateTaskSchema,
} from "../src/routes/schemas";

describe("request schemas", () => {
  it("requires a task title and bounds the duration", () => {
    expect(createTaskSchema.safeParse({ title: "   " }).success).toBe(false);
    expect(createTaskSchema.safeParse({ title: "Write", durationMinutes: 500 }).success).toBe(false);
    expect(createTaskSchema.parse({ title: "  Write report " })).toEqual({ title: "Write report" });
  });

  it("rejects an empty update", () => {
    expect(updateTaskSchema.safeParse({}).success).toBe(false);
    expect(updateTaskSchema.safeParse({ status: "completed" }).success).toBe(true);
    expect(updateTaskSchema.safeParse({ status: "done" }).success).toBe(false);
  });

  it("fills resolve and suggest defaults", () => {
    expect(resolveScheduleSchema.parse({})).toEqual({ durationMinutes: 30, avoidNaps: false, autoSchedule: true });
    expect(suggestSlotsSchema.parse({ baseTime: "tomorrow" })).toEqual({
      baseTime: "tomorrow",
      durationMinutes: 30,
      avoidNaps: false,
    });
  });

  it("caps stagger offsets", () => {
    expect(suggestSlotsSchema.safeParse({ offsetsMinutes: [0, 1, 2, 3, 4, 5, 6] }).success).toBe(false);
  });

  it("coerces entry start times", () => {
    const parsed = createEntrySchema.parse({ label: "Dentist", start: "2024-06-15T10:00:00.000Z" });
    expect(parsed.start).toEqual(new Date("2024-06-15T10:00:00.000Z"));
    expect(createEntrySchema.safeParse({ label: "Dentist", start: "soon" }).success).toBe(false);
  });

  it("accepts known moods only", () => {
    expect(moodSignalSchema.parse({ label: "tired" })).toEqual({ label: "tired", rawScore: 0 });
    expect(moodSignalSchema.safeParse({ label: "sleepy" }).success).toBe(false);
  });

  it("needs at least one plan item", () => {
    expect(planTasksSchema.safeParse({ items: [] }).success).toBe(false);
    expect(planTasksSchema.safeParse({ items: [{ title: "Nap" }], mood: { label: "focused" } }).success).toBe(true);
  });
});
