import { describe, expect, it } from "vitest";

import { InvalidInputError } from "../../errors.js";
import { resolveDateRange } from "../date-range.js";

const NOW = new Date("2025-06-10T00:00:00.000Z");

describe("resolveDateRange", () => {
  it("defaults to the last defaultDays ending now", () => {
    const range = resolveDateRange({ defaultDays: 7, maxDays: 90, now: NOW });
    expect(range.end).toEqual(NOW);
    expect(range.start.toISOString()).toBe("2025-06-03T00:00:00.000Z");
  });

  it("counts the default window back from an explicit end", () => {
    const range = resolveDateRange({ end: "2025-01-31T00:00:00Z", defaultDays: 1, maxDays: 90, now: NOW });
    expect(range.start.toISOString()).toBe("2025-01-30T00:00:00.000Z");
  });

  it("accepts explicit bounds", () => {
    const range = resolveDateRange({
      start: "2025-05-01T00:00:00Z",
      end: "2025-05-02T12:00:00Z",
      defaultDays: 7,
      maxDays: 90,
    });
    expect(range.start.toISOString()).toBe("2025-05-01T00:00:00.000Z");
    expect(range.end.toISOString()).toBe("2025-05-02T12:00:00.000Z");
  });

  it("rejects a reversed range", () => {
    expect(() =>
      resolveDateRange({ start: "2025-05-02", end: "2025-05-01", defaultDays: 7, maxDays: 90 }),
    ).toThrow(InvalidInputError);
  });

  it("rejects an unparseable date", () => {
    expect(() => resolveDateRange({ start: "nope", defaultDays: 7, maxDays: 90, now: NOW })).toThrow(
      "Invalid start date 'nope'",
    );
  });

  it("rejects ranges longer than maxDays", () => {
    expect(() =>
      resolveDateRange({ start: "2025-01-01T00:00:00Z", end: "2025-04-11T00:00:00Z", defaultDays: 7, maxDays: 90 }),
    ).toThrow("Date range of 100 days exceeds the maximum of 90");
  });
});
