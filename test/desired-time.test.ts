import { describe, it, expect } from "vitest";
import { parseDesiredTime } from "../src/utils/desiredTime";
import { formatLocalDate, parseLocalDate } from "../src/utils/timezone";

// Saturday 10:00 UTC
const now = new Date("2024-06-15T10:00:00.000Z");
const utc = { now, timezone: "UTC" };

function parsed(text: string, options = utc): string | null {
  const result = parseDesiredTime(text, options);
  return result ? result.toISOString() : null;
}

describe("parseDesiredTime", () => {
  describe("ISO-8601", () => {
    it("reads a wall time without offset in the user's timezone", () => {
      expect(parsed("2024-06-20T14:30")).toBe("2024-06-20T14:30:00.000Z");
      expect(parsed("2024-06-20T14:30", { now, timezone: "America/New_York" })).toBe("2024-06-20T18:30:00.000Z");
    });

    it("keeps an explicit offset", () => {
      expect(parsed("2024-06-20T14:30:00+02:00")).toBe("2024-06-20T12:30:00.000Z");
      expect(parsed("2024-06-20T14:30:00.000Z")).toBe("2024-06-20T14:30:00.000Z");
    });

    it("places a bare date at nine in the morning", () => {
      expect(parsed("2024-06-20")).toBe("2024-06-20T09:00:00.000Z");
    });
  });

  describe("relative phrases", () => {
    it("adds minutes and hours to now", () => {
      expect(parsed("in 45 minutes")).toBe("2024-06-15T10:45:00.000Z");
      expect(parsed("in 2 hours")).toBe("2024-06-15T12:00:00.000Z");
    });

    it("reads tomorrow with and without a clock time", () => {
      expect(parsed("tomorrow")).toBe("2024-06-16T09:00:00.000Z");
      expect(parsed("tomorrow at 3pm")).toBe("2024-06-16T15:00:00.000Z");
      expect(parsed("Tomorrow 07:45")).toBe("2024-06-16T07:45:00.000Z");
    });

    it("reads today with a twelve-hour clock time", () => {
      expect(parsed("today 6:30 pm")).toBe("2024-06-15T18:30:00.000Z");
    });

    it("reads parts of the day", () => {
      expect(parsed("this evening")).toBe("2024-06-15T18:00:00.000Z");
      expect(parsed("tomorrow morning")).toBe("2024-06-16T09:00:00.000Z");
    });

    it("rolls a passed clock time with no day over to tomorrow", () => {
      expect(parsed("8am")).toBe("2024-06-16T08:00:00.000Z");
      expect(parsed("15:30")).toBe("2024-06-15T15:30:00.000Z");
      expect(parsed("at 9")).toBe("2024-06-16T09:00:00.000Z");
    });
  });

  it("returns null for text without a time", () => {
    expect(parsed("unscheduled")).toBeNull();
    expect(parsed("whenever")).toBeNull();
    expect(parsed("   ")).toBeNull();
    expect(parseDesiredTime(undefined, utc)).toBeNull();
  });
});

describe("timezone helpers", () => {
  it("returns null for strings dayjs cannot read", () => {
    expect(parseLocalDate("not a date", "UTC")).toBeNull();
  });

  it("formats in the given timezone", () => {
    expect(formatLocalDate("2024-06-15T18:30:00.000Z", "YYYY-MM-DD HH:mm", "Europe/Berlin")).toBe("2024-06-15 20:30");
  });
});
