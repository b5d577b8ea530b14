import { describe, it, expect } from "vitest";
import { addMinutes } from "date-fns";
import { hasConflict, resolveConflict } from "../src/scheduling/conflictResolver";
import { withReservation } from "../src/scheduling/intervals";
import TestUtils from "./test-utilities";

const { at, busy } = TestUtils;

describe("resolveConflict", () => {
  const standup = [busy("Standup", "09:00", "09:30")];

  it("keeps a free desired time and drops its seconds", () => {
    const result = resolveConflict(new Date("2024-06-15T14:07:45.000Z"), standup, { blockMinutes: 15 });
    expect(result).toEqual({ time: at("14:07"), changed: false, degraded: false });
  });

  it("moves a colliding desired time to the next free slot", () => {
    const result = resolveConflict(at("09:00"), standup, { durationMinutes: 30, blockMinutes: 15 });
    expect(result).toEqual({ time: at("09:30"), changed: true, degraded: false });
  });

  it("searches from now when there is no desired time", () => {
    const result = resolveConflict(null, [], { now: at("09:02"), blockMinutes: 15 });
    expect(result).toEqual({ time: at("09:15"), changed: true, degraded: false });
  });

  it("only ever moves later", () => {
    const day = [
      busy("Standup", "09:00", "09:30"),
      busy("Review", "10:00", "11:00"),
      busy("Lunch", "12:00", "13:00"),
    ];
    for (const desired of [at("08:45"), at("09:10"), at("10:30"), at("11:50"), at("12:59")]) {
      const result = resolveConflict(desired, day, { durationMinutes: 30, blockMinutes: 15 });
      expect(result.time.getTime()).toBeGreaterThanOrEqual(desired.getTime());
    }
  });

  it("accepts its own result once that result is reserved", () => {
    const first = resolveConflict(at("09:00"), standup, { durationMinutes: 30, blockMinutes: 15 });
    const reserved = withReservation(standup, {
      start: first.time,
      end: addMinutes(first.time, 30),
      label: "Task#t1 (30m): Write report",
      taskId: "t1",
    });

    const second = resolveConflict(first.time, reserved, {
      durationMinutes: 30,
      blockMinutes: 15,
      excludeTaskId: "t1",
    });
    expect(second).toEqual({ time: at("09:30"), changed: false, degraded: false });
  });

  it("moves a nap out of a meeting buffer", () => {
    const result = resolveConflict(at("10:10"), [busy("Team meeting", "10:00", "10:30")], {
      durationMinutes: 10,
      avoidNaps: true,
      meetingBufferMinutes: 20,
      blockMinutes: 15,
    });
    expect(result.changed).toBe(true);
    expect(result.time.getTime()).toBeGreaterThanOrEqual(at("10:50").getTime());
  });

  it("flags a degraded result when the horizon runs out", () => {
    const result = resolveConflict(at("09:00"), [busy("Offsite", "08:00", "23:00")], {
      horizonHours: 1,
      blockMinutes: 15,
    });
    expect(result).toEqual({ time: at("10:00"), changed: true, degraded: true });
  });
});

describe("hasConflict", () => {
  const meeting = [busy("Client call", "10:00", "10:30")];

  it("applies the meeting buffer only for naps", () => {
    expect(hasConflict(at("10:40"), meeting, { durationMinutes: 10, avoidNaps: true })).toBe(true);
    expect(hasConflict(at("10:40"), meeting, { durationMinutes: 10 })).toBe(false);
  });

  it("sees a plain overlap", () => {
    expect(hasConflict(at("09:45"), meeting, { durationMinutes: 30 })).toBe(true);
    expect(hasConflict(at("09:30"), meeting, { durationMinutes: 30 })).toBe(false);
  });
});
