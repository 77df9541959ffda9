import { beforeEach, describe, expect, it, vi } from "vitest";
import { Difficulty, SessionStatus } from "../common/common-enum";
import { InvalidStateError, NotFoundError, ValidationError } from "../common/errors";
import { sharedExercise } from "../testing/fixtures";
import { createMemoryStores } from "../testing/memoryStores";
import { SESSION_TRANSITIONS, SessionService, canTransition } from "./session.service";

const OWNER = 1;
const OTHER = 2;

describe("session transitions", () => {
  it("only allows the documented edges", () => {
    const allowed = Object.values(SessionStatus).flatMap((from) =>
      Object.values(SessionStatus)
        .filter((to) => canTransition(from, to))
        .map((to) => `${from}->${to}`)
    );
    expect(allowed).toEqual([
      "planned->in_progress",
      "planned->cancelled",
      "in_progress->completed",
      "in_progress->cancelled",
    ]);
  });

  it("has terminal completed and cancelled states", () => {
    expect(SESSION_TRANSITIONS[SessionStatus.COMPLETED]).toEqual([]);
    expect(SESSION_TRANSITIONS[SessionStatus.CANCELLED]).toEqual([]);
  });
});

describe("SessionService", () => {
  let stores: ReturnType<typeof createMemoryStores>;
  let service: SessionService;

  beforeEach(() => {
    stores = createMemoryStores();
    service = new SessionService(stores.sessions, stores.workouts, stores.logs, stores.clock);
  });

  it("creates planned sessions dated by their creation time", async () => {
    const session = await service.create(OWNER, { notes: "morning" });

    expect(session.status).toBe(SessionStatus.PLANNED);
    expect(session.startTime).toBeNull();
    expect(session.endTime).toBeNull();
    expect(session.totalVolume).toBe(0);
    expect(session.date).toBe("2024-03-01");
  });

  it("refuses a workout the owner cannot see", async () => {
    const hidden = await stores.workouts.create({
      name: "Private",
      description: "",
      ownerIdentityId: OTHER,
      exercises: [],
      difficulty: Difficulty.BEGINNER,
      estimatedDurationMinutes: 0,
      tags: [],
      isTemplate: true,
      isPublic: false,
      totalExercises: 0,
    });

    await expect(service.create(OWNER, { workoutId: hidden.id })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("starts only planned sessions", async () => {
    const { id } = await service.create(OWNER);
    stores.clock.set("2024-03-01T18:00:00.000Z");

    const started = await service.start(OWNER, id);
    expect(started.status).toBe(SessionStatus.IN_PROGRESS);
    expect(started.startTime?.toISOString()).toBe("2024-03-01T18:00:00.000Z");

    await expect(service.start(OWNER, id)).rejects.toThrowError(
      new InvalidStateError("Cannot start a session that is in_progress")
    );
  });

  it("completes with duration, volume and outcome", async () => {
    const exercise = await stores.exercises.create(sharedExercise());
    const { id } = await service.create(OWNER);
    await service.start(OWNER, id);
    await stores.logs.create({
      sessionId: id,
      exerciseId: exercise.id,
      ownerIdentityId: OWNER,
      setNumber: 1,
      reps: 8,
      weight: 50,
      durationSeconds: null,
      distance: null,
      perceivedExertion: null,
      notes: "",
      completedAt: stores.clock.now(),
    });
    stores.clock.advanceMinutes(42);

    const completed = await service.complete(OWNER, id, { rating: 4, caloriesBurned: 310 });
    expect(completed.status).toBe(SessionStatus.COMPLETED);
    expect(completed.endTime?.toISOString()).toBe("2024-03-01T10:42:00.000Z");
    expect(completed.actualDurationMinutes).toBe(42);
    expect(completed.totalVolume).toBe(400);
    expect(completed.rating).toBe(4);
    expect(completed.caloriesBurned).toBe(310);
  });

  it("does not complete a session that never started", async () => {
    const { id } = await service.create(OWNER);
    await expect(service.complete(OWNER, id)).rejects.toThrowError(
      new InvalidStateError("Cannot complete a session that is planned")
    );
  });

  it("rejects ratings outside 1..5 before touching the session", async () => {
    const { id } = await service.create(OWNER);
    await service.start(OWNER, id);

    await expect(service.complete(OWNER, id, { rating: 6 })).rejects.toBeInstanceOf(
      ValidationError
    );
    const unchanged = await service.get(OWNER, id);
    expect(unchanged.status).toBe(SessionStatus.IN_PROGRESS);
  });

  it("cancels planned and running sessions without an end time", async () => {
    const planned = await service.create(OWNER);
    const running = await service.create(OWNER);
    await service.start(OWNER, running.id);

    const first = await service.cancel(OWNER, planned.id);
    const second = await service.cancel(OWNER, running.id);
    expect(first.status).toBe(SessionStatus.CANCELLED);
    expect(second.status).toBe(SessionStatus.CANCELLED);
    expect(second.endTime).toBeNull();
    expect(second.totalVolume).toBe(0);

    await expect(service.start(OWNER, planned.id)).rejects.toBeInstanceOf(InvalidStateError);
    await expect(service.cancel(OWNER, planned.id)).rejects.toThrowError(
      new InvalidStateError("Cannot cancel a session that is cancelled")
    );
  });

  it("cannot cancel a completed session", async () => {
    const { id } = await service.create(OWNER);
    await service.start(OWNER, id);
    await service.complete(OWNER, id);

    await expect(service.cancel(OWNER, id)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("reports sessions of other owners as missing", async () => {
    const { id } = await service.create(OWNER);

    await expect(service.start(OTHER, id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.get(OTHER, id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.delete(OTHER, id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.start(OWNER, "session-404")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lets exactly one of two concurrent starts win", async () => {
    const { id } = await service.create(OWNER);

    const results = await Promise.allSettled([service.start(OWNER, id), service.start(OWNER, id)]);
    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(InvalidStateError);
  });

  it("reports the state another writer left behind when its conditional write loses", async () => {
    const { id } = await service.create(OWNER);
    const transition = stores.sessions.transition.bind(stores.sessions);
    vi.spyOn(stores.sessions, "transition").mockImplementationOnce(
      async (sessionId, ownerId, from, patch) => {
        stores.sessions.forceStatus(sessionId, SessionStatus.CANCELLED);
        return transition(sessionId, ownerId, from, patch);
      }
    );

    await expect(service.start(OWNER, id)).rejects.toThrowError(
      new InvalidStateError("Cannot start a session that is cancelled")
    );
  });

  it("lists newest first by derived date and filters by day", async () => {
    const early = await service.create(OWNER);
    stores.clock.set("2024-03-03T07:00:00.000Z");
    const late = await service.create(OWNER);
    stores.clock.set("2024-03-05T20:00:00.000Z");
    await service.start(OWNER, early.id);
    await service.create(OTHER);

    const all = await service.list(OWNER);
    expect(all.results.map((s) => [s.id, s.date])).toEqual([
      [early.id, "2024-03-05"],
      [late.id, "2024-03-03"],
    ]);

    const window = await service.list(OWNER, {
      dateFrom: new Date("2024-03-02"),
      dateTo: new Date("2024-03-03"),
    });
    expect(window.results.map((s) => s.id)).toEqual([late.id]);
  });

  it("edits descriptive fields in any state", async () => {
    const { id } = await service.create(OWNER);
    await service.start(OWNER, id);
    await service.complete(OWNER, id);

    const updated = await service.update(OWNER, id, { notes: "felt strong", rating: 5 });
    expect(updated.notes).toBe("felt strong");
    expect(updated.rating).toBe(5);
    expect(updated.status).toBe(SessionStatus.COMPLETED);

    await expect(service.update(OWNER, id, { caloriesBurned: -1 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("resolves its workout and tolerates the workout being deleted", async () => {
    const workout = await stores.workouts.create({
      name: "Full Body",
      description: "",
      ownerIdentityId: OWNER,
      exercises: [],
      difficulty: Difficulty.BEGINNER,
      estimatedDurationMinutes: 0,
      tags: [],
      isTemplate: true,
      isPublic: false,
      totalExercises: 0,
    });
    const { id } = await service.create(OWNER, { workoutId: workout.id });

    expect((await service.get(OWNER, id)).workout?.name).toBe("Full Body");

    await stores.workouts.delete(workout.id);
    const orphaned = await service.get(OWNER, id);
    expect(orphaned.workoutId).toBe(workout.id);
    expect(orphaned.workout).toBeNull();
  });

  it("deletes the session together with its logs", async () => {
    const { id } = await service.create(OWNER);
    await stores.logs.create({
      sessionId: id,
      exerciseId: "exercise-1",
      ownerIdentityId: OWNER,
      setNumber: 1,
      reps: 5,
      weight: null,
      durationSeconds: null,
      distance: null,
      perceivedExertion: null,
      notes: "",
      completedAt: stores.clock.now(),
    });

    await service.delete(OWNER, id);
    expect(await stores.sessions.findById(id)).toBeNull();
    expect(await stores.logs.listBySession(id)).toEqual([]);
  });
});
