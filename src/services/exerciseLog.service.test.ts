import { beforeEach, describe, expect, it } from "vitest";
import {
  InvalidStateError,
  NotFoundError,
  StoreUnavailable,
  ValidationError,
} from "../common/errors";
import { customExercise, sharedExercise } from "../testing/fixtures";
import { createMemoryStores } from "../testing/memoryStores";
import { ExerciseLogService } from "./exerciseLog.service";
import { SessionService } from "./session.service";

const OWNER = 1;
const OTHER = 2;

describe("ExerciseLogService", () => {
  let stores: ReturnType<typeof createMemoryStores>;
  let sessions: SessionService;
  let service: ExerciseLogService;
  let squatId: string;
  let sessionId: string;

  beforeEach(async () => {
    stores = createMemoryStores();
    sessions = new SessionService(stores.sessions, stores.workouts, stores.logs, stores.clock);
    service = new ExerciseLogService(stores.logs, stores.exercises, sessions, stores.clock);
    squatId = (await stores.exercises.create(sharedExercise({ name: "Back Squat" }))).id;
    sessionId = (await sessions.create(OWNER)).id;
    await sessions.start(OWNER, sessionId);
  });

  it("numbers sets per exercise and stamps the owner", async () => {
    const first = await service.createOne(OWNER, sessionId, {
      exerciseId: squatId,
      reps: 5,
      weight: 100,
    });
    const second = await service.createOne(OWNER, sessionId, {
      exerciseId: squatId,
      reps: 5,
      weight: 105,
    });

    expect(first.setNumber).toBe(1);
    expect(second.setNumber).toBe(2);
    expect(second.ownerIdentityId).toBe(OWNER);
    expect(second.completedAt.toISOString()).toBe("2024-03-01T10:00:00.000Z");
  });

  it("requires at least one metric", async () => {
    await expect(
      service.createOne(OWNER, sessionId, { exerciseId: squatId, notes: "forgot" })
    ).rejects.toThrowError(
      new ValidationError("At least one of reps, weight, durationSeconds or distance is required")
    );
  });

  it("accepts a log with only a duration", async () => {
    const plank = await service.createOne(OWNER, sessionId, {
      exerciseId: squatId,
      durationSeconds: 60,
    });
    expect(plank.reps).toBeNull();
    expect(plank.durationSeconds).toBe(60);
  });

  it("rejects a set number that is already taken", async () => {
    await service.createOne(OWNER, sessionId, { exerciseId: squatId, setNumber: 3, reps: 5 });

    await expect(
      service.createOne(OWNER, sessionId, { exerciseId: squatId, setNumber: 3, reps: 6 })
    ).rejects.toThrowError(new ValidationError("set 3 is already logged for this exercise"));
  });

  it("rejects exercises that are missing or private to someone else", async () => {
    const privateId = (await stores.exercises.create(customExercise(OTHER))).id;

    await expect(
      service.createOne(OWNER, sessionId, { exerciseId: "exercise-404", reps: 5 })
    ).rejects.toThrowError(new ValidationError("unknown exercise exercise-404"));
    await expect(
      service.createOne(OWNER, sessionId, { exerciseId: privateId, reps: 5 })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects an out-of-range perceived exertion", async () => {
    await expect(
      service.createOne(OWNER, sessionId, { exerciseId: squatId, reps: 5, perceivedExertion: 11 })
    ).rejects.toThrowError(
      new ValidationError("perceivedExertion must be an integer between 1 and 10")
    );
  });

  it("only logs against a running session of the caller", async () => {
    const planned = await sessions.create(OWNER);

    await expect(
      service.createOne(OWNER, planned.id, { exerciseId: squatId, reps: 5 })
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(
      service.createOne(OTHER, sessionId, { exerciseId: squatId, reps: 5 })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  describe("createBulk", () => {
    it("reports each item at its index and keeps the valid ones", async () => {
      const result = await service.createBulk(OWNER, sessionId, [
        { exerciseId: squatId, reps: 5, weight: 100 },
        { exerciseId: squatId, notes: "no metrics" },
        { exerciseId: squatId, reps: 5, weight: 110 },
      ]);

      expect(result.created).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.results.map((r) => [r.index, r.status])).toEqual([
        [0, "created"],
        [1, "failed"],
        [2, "created"],
      ]);
      expect(result.results[1]).toEqual({
        index: 1,
        status: "failed",
        error: {
          kind: "ValidationError",
          message: "At least one of reps, weight, durationSeconds or distance is required",
        },
      });

      const stored = await stores.logs.listBySession(sessionId);
      expect(stored.map((log) => [log.setNumber, log.weight])).toEqual([
        [1, 100],
        [2, 110],
      ]);
    });

    it("reports items that failed parsing in place", async () => {
      const result = await service.createBulk(OWNER, sessionId, [
        new ValidationError("exerciseId is required"),
        { exerciseId: squatId, reps: 8 },
      ]);

      expect(result.results[0]).toEqual({
        index: 0,
        status: "failed",
        error: { kind: "ValidationError", message: "exerciseId is required" },
      });
      expect(result.results[1].status).toBe("created");
    });

    it("takes between 1 and 100 items", async () => {
      await expect(service.createBulk(OWNER, sessionId, [])).rejects.toBeInstanceOf(
        ValidationError
      );
      const tooMany = Array.from({ length: 101 }, () => ({ exerciseId: squatId, reps: 1 }));
      await expect(service.createBulk(OWNER, sessionId, tooMany)).rejects.toThrow(
        "Bulk requests take between 1 and 100 logs"
      );
      expect(await stores.logs.listBySession(sessionId)).toEqual([]);
    });

    it("aborts when the document store goes away", async () => {
      stores.state.down = true;

      await expect(
        service.createBulk(OWNER, sessionId, [{ exerciseId: squatId, reps: 5 }])
      ).rejects.toBeInstanceOf(StoreUnavailable);
    });
  });

  it("keeps a completed session's volume in step with log edits", async () => {
    const heavy = await service.createOne(OWNER, sessionId, {
      exerciseId: squatId,
      reps: 5,
      weight: 100,
    });
    const light = await service.createOne(OWNER, sessionId, {
      exerciseId: squatId,
      reps: 10,
      weight: 50,
    });
    const completed = await sessions.complete(OWNER, sessionId);
    expect(completed.totalVolume).toBe(1000);

    await service.update(OWNER, heavy.id, { weight: 120 });
    expect((await sessions.get(OWNER, sessionId)).totalVolume).toBe(1100);

    await service.delete(OWNER, light.id);
    expect((await sessions.get(OWNER, sessionId)).totalVolume).toBe(600);
  });

  it("re-checks the metric rule on the merged log", async () => {
    const log = await service.createOne(OWNER, sessionId, { exerciseId: squatId, reps: 5 });

    await expect(service.update(OWNER, log.id, { reps: null })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("shows callers their own logs and staff everyone's", async () => {
    await service.createOne(OWNER, sessionId, { exerciseId: squatId, reps: 5 });
    const otherSession = await sessions.create(OTHER);
    await sessions.start(OTHER, otherSession.id);
    await service.createOne(OTHER, otherSession.id, { exerciseId: squatId, reps: 3 });

    const own = await service.list({ id: OWNER, isStaff: false });
    expect(own.count).toBe(1);
    expect(own.pageSize).toBe(50);
    expect(own.results[0].ownerIdentityId).toBe(OWNER);

    const staff = await service.list({ id: 99, isStaff: true });
    expect(staff.count).toBe(2);
    expect(staff.results.map((log) => log.ownerIdentityId)).toEqual([OTHER, OWNER]);
  });

  it("hides another identity's log", async () => {
    const log = await service.createOne(OWNER, sessionId, { exerciseId: squatId, reps: 5 });

    await expect(service.get({ id: OTHER, isStaff: false }, log.id)).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(service.delete(OTHER, log.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
