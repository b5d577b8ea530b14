import { describe, it, expect } from "vitest";
import { loadConfig, readPositiveInt } from "../src/config";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      mongoUri: "mongodb://127.0.0.1:27017/mood-scheduler",
      jwtSecret: "change-me",
      accessKey: undefined,
      scheduler: {
        blockMinutes: 15,
        horizonHours: 12,
        meetingBufferMinutes: 20,
        calendarQueryLimit: 80,
        timezone: "UTC",
      },
    });
  });

  it("reads scheduler settings from the environment", () => {
    const loaded = loadConfig({
      USER_TIMEZONE: "Europe/Berlin",
      SCHEDULER_BLOCK_MINUTES: "30",
      SCHEDULER_HORIZON_HOURS: "24",
      ACCESS_KEY: "test-secret",
    });
    expect(loaded.scheduler).toMatchObject({ timezone: "Europe/Berlin", blockMinutes: 30, horizonHours: 24 });
    expect(loaded.accessKey).toBe("test-secret");
  });
});

describe("readPositiveInt", () => {
  it("ignores values that are not positive integers", () => {
    expect(readPositiveInt("abc", 5)).toBe(5);
    expect(readPositiveInt("-3", 5)).toBe(5);
    expect(readPositiveInt("0", 5)).toBe(5);
    expect(readPositiveInt(" ", 5)).toBe(5);
    expect(readPositiveInt(undefined, 5)).toBe(5);
  });

  it("parses a positive integer", () => {
    expect(readPositiveInt("20", 5)).toBe(20);
  });
});
