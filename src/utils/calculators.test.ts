import { describe, expect, it } from "vitest";
import { WorkoutCalculator, endOfUtcDay, startOfUtcDay } from "./calculators";

const calculator = new WorkoutCalculator();

describe("WorkoutCalculator", () => {
  describe("estimateDurationMinutes", () => {
    it("charges every set its rest plus 45 seconds of work", () => {
      // 4 × (90 + 45) + 3 × (60 + 45) = 855 s
      const minutes = calculator.estimateDurationMinutes([
        { targetSets: 4, restSeconds: 90 },
        { targetSets: 3, restSeconds: 60 },
      ]);
      expect(minutes).toBe(14);
    });

    it("is zero for an empty workout", () => {
      expect(calculator.estimateDurationMinutes([])).toBe(0);
    });

    it("uses the configured working time per set", () => {
      const slow = new WorkoutCalculator(75);
      // 2 × (45 + 75) = 240 s
      expect(slow.estimateDurationMinutes([{ targetSets: 2, restSeconds: 45 }])).toBe(4);
    });
  });

  it("rounds elapsed time to whole minutes", () => {
    const start = new Date("2024-03-01T10:00:00.000Z");
    expect(calculator.elapsedMinutes(start, new Date("2024-03-01T10:42:29.000Z"))).toBe(42);
    expect(calculator.elapsedMinutes(start, new Date("2024-03-01T10:42:31.000Z"))).toBe(43);
  });

  it("sums reps × weight and counts a missing factor as zero", () => {
    const volume = calculator.totalVolume([
      { reps: 10, weight: 100 },
      { reps: null, weight: 60 },
      { reps: 12, weight: null },
      { reps: 5, weight: 20 },
    ]);
    expect(volume).toBe(1100);
  });

  describe("sessionDate", () => {
    const createdAt = new Date("2024-02-28T08:00:00.000Z");

    it("prefers the end time", () => {
      const date = calculator.sessionDate({
        createdAt,
        startTime: new Date("2024-03-01T23:30:00.000Z"),
        endTime: new Date("2024-03-02T00:15:00.000Z"),
      });
      expect(date).toBe("2024-03-02");
    });

    it("falls back to the start time, then the creation time", () => {
      expect(
        calculator.sessionDate({
          createdAt,
          startTime: new Date("2024-03-01T23:30:00.000Z"),
          endTime: null,
        })
      ).toBe("2024-03-01");
      expect(calculator.sessionDate({ createdAt, startTime: null, endTime: null })).toBe(
        "2024-02-28"
      );
    });
  });

  it("widens dates to whole UTC days", () => {
    const day = new Date("2024-03-05T13:20:00.000Z");
    expect(startOfUtcDay(day).toISOString()).toBe("2024-03-05T00:00:00.000Z");
    expect(endOfUtcDay(day).toISOString()).toBe("2024-03-05T23:59:59.999Z");
  });
});
