import { SessionStatus } from "../common/common-enum";
import { Clock, systemClock } from "../common/clock";
import {
  ErrorDetail,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../common/errors";
import {
  ExerciseLogRepository,
  SessionRepository,
  WorkoutRepository,
} from "../repositories/types";
import { Page } from "../types/model/page.model";
import { IdentityId, WeakReference } from "../types/model/reference.model";
import { Workout } from "../types/model/workout.model";
import {
  NewWorkoutSession,
  SessionWorkoutSummary,
  WorkoutSession,
  WorkoutSessionView,
} from "../types/model/workoutSession.model";
import {
  SessionCompleteInput,
  SessionCreateInput,
  SessionFilters,
  SessionUpdateInput,
} from "../types/request/sessionRequest";
import {
  WorkoutCalculator,
  endOfUtcDay,
  startOfUtcDay,
  workoutCalculator,
} from "../utils/calculators";
import { SESSION_CONSTANTS } from "../utils/constants";
import { logger } from "../utils/logger";
import { toPage, toSlice } from "../utils/pagination";
import { canViewWorkout } from "./workout.service";

const log = logger.child("SessionLifecycle");

/** Allowed edges of the session lifecycle. Completed and cancelled are terminal. */
export const SESSION_TRANSITIONS: Readonly<Record<SessionStatus, readonly SessionStatus[]>> = {
  [SessionStatus.PLANNED]: [SessionStatus.IN_PROGRESS, SessionStatus.CANCELLED],
  [SessionStatus.IN_PROGRESS]: [SessionStatus.COMPLETED, SessionStatus.CANCELLED],
  [SessionStatus.COMPLETED]: [],
  [SessionStatus.CANCELLED]: [],
};

export const canTransition = (from: SessionStatus, to: SessionStatus): boolean =>
  SESSION_TRANSITIONS[from].includes(to);

/** Statuses from which `to` can be reached. */
const sourcesOf = (to: SessionStatus): SessionStatus[] =>
  Object.values(SessionStatus).filter((from) => canTransition(from, to));

const ACTION_VERB: Partial<Record<SessionStatus, string>> = {
  [SessionStatus.IN_PROGRESS]: "start",
  [SessionStatus.COMPLETED]: "complete",
  [SessionStatus.CANCELLED]: "cancel",
};

const toWorkoutSummary = (workout: Workout): SessionWorkoutSummary => ({
  id: workout.id,
  name: workout.name,
  difficulty: workout.difficulty,
  estimatedDurationMinutes: workout.estimatedDurationMinutes,
  totalExercises: workout.totalExercises,
});

function validateOutcome(input: { rating?: number | null; caloriesBurned?: number | null }) {
  const issues: ErrorDetail[] = [];
  const { rating, caloriesBurned } = input;
  if (
    rating !== undefined &&
    rating !== null &&
    (!Number.isInteger(rating) ||
      rating < SESSION_CONSTANTS.MIN_RATING ||
      rating > SESSION_CONSTANTS.MAX_RATING)
  ) {
    issues.push({ path: "rating", message: "rating must be an integer between 1 and 5" });
  }
  if (caloriesBurned !== undefined && caloriesBurned !== null && !(caloriesBurned >= 0)) {
    issues.push({ path: "caloriesBurned", message: "caloriesBurned must be >= 0" });
  }
  if (issues.length > 0) {
    throw new ValidationError(issues[0].message, issues);
  }
}

/**
 * Drives a workout session through planned → in_progress → completed, or to
 * cancelled, and maintains the fields derived from its timestamps and logs.
 *
 * Sessions belonging to someone else are reported as not found, the same
 * as sessions that do not exist.
 */
export class SessionService {
  constructor(
    private readonly sessions: SessionRepository,
    private readonly workouts: WorkoutRepository,
    private readonly logs: ExerciseLogRepository,
    private readonly clock: Clock = systemClock,
    private readonly calculator: WorkoutCalculator = workoutCalculator
  ) {}

  async create(ownerId: IdentityId, input: SessionCreateInput = {}): Promise<WorkoutSessionView> {
    const workoutId = input.workoutId ?? null;
    if (workoutId !== null) {
      const workout = await this.workouts.findById(workoutId);
      if (!workout || !canViewWorkout(workout, ownerId)) {
        throw new NotFoundError("Workout not found");
      }
    }

    const session: NewWorkoutSession = {
      ownerIdentityId: ownerId,
      workoutId,
      status: SessionStatus.PLANNED,
      scheduledDate: input.scheduledDate ?? null,
      startTime: null,
      endTime: null,
      actualDurationMinutes: null,
      rating: null,
      caloriesBurned: null,
      totalVolume: 0,
      notes: input.notes ?? "",
    };
    const created = await this.sessions.create(session);
    log.info(`Session ${created.id} planned by identity ${ownerId}`);
    return this.toView(created);
  }

  async start(ownerId: IdentityId, sessionId: string): Promise<WorkoutSessionView> {
    const now = this.clock.now();
    return this.transition(ownerId, sessionId, SessionStatus.IN_PROGRESS, async () => ({
      startTime: now,
    }));
  }

  async complete(
    ownerId: IdentityId,
    sessionId: string,
    outcome: SessionCompleteInput = {}
  ): Promise<WorkoutSessionView> {
    validateOutcome(outcome);
    const now = this.clock.now();

    return this.transition(ownerId, sessionId, SessionStatus.COMPLETED, async (session) => {
      const logs = await this.logs.listBySession(session.id);
      const patch: Partial<NewWorkoutSession> = {
        endTime: now,
        actualDurationMinutes: this.calculator.elapsedMinutes(session.startTime ?? now, now),
        totalVolume: this.calculator.totalVolume(logs),
      };
      if (outcome.rating !== undefined) patch.rating = outcome.rating;
      if (outcome.notes !== undefined) patch.notes = outcome.notes;
      if (outcome.caloriesBurned !== undefined) patch.caloriesBurned = outcome.caloriesBurned;
      return patch;
    });
  }

  /** Leaves end time and volume unset. */
  async cancel(ownerId: IdentityId, sessionId: string): Promise<WorkoutSessionView> {
    return this.transition(ownerId, sessionId, SessionStatus.CANCELLED, async () => ({}));
  }

  async get(ownerId: IdentityId, sessionId: string): Promise<WorkoutSessionView> {
    const session = await this.requireOwned(ownerId, sessionId);
    const workoutRef = session.workoutId
      ? new WeakReference(session.workoutId, (id) => this.workouts.findById(id))
      : null;
    const workout = workoutRef ? await workoutRef.resolve() : null;
    return {
      ...this.toView(session),
      workout: workout ? toWorkoutSummary(workout) : null,
    };
  }

  async list(ownerId: IdentityId, filters: SessionFilters = {}): Promise<Page<WorkoutSessionView>> {
    const { page, pageSize, slice } = toSlice(filters);
    const counted = await this.sessions.list(
      {
        ownerIdentityId: ownerId,
        status: filters.status,
        // Whole calendar days, matched against the derived date
        dateFrom: filters.dateFrom ? startOfUtcDay(filters.dateFrom) : undefined,
        dateTo: filters.dateTo ? endOfUtcDay(filters.dateTo) : undefined,
      },
      slice
    );
    return toPage(counted, page, pageSize, (session) => this.toView(session));
  }

  /** Edits descriptive fields; status only moves through the transitions. */
  async update(
    ownerId: IdentityId,
    sessionId: string,
    input: SessionUpdateInput
  ): Promise<WorkoutSessionView> {
    validateOutcome(input);
    await this.requireOwned(ownerId, sessionId);

    const patch: Partial<NewWorkoutSession> = {};
    if (input.scheduledDate !== undefined) patch.scheduledDate = input.scheduledDate;
    if (input.notes !== undefined) patch.notes = input.notes;
    if (input.rating !== undefined) patch.rating = input.rating;
    if (input.caloriesBurned !== undefined) patch.caloriesBurned = input.caloriesBurned;

    const updated = await this.sessions.update(sessionId, patch);
    if (!updated) throw new NotFoundError("Workout session not found");
    return this.toView(updated);
  }

  async delete(ownerId: IdentityId, sessionId: string): Promise<void> {
    await this.requireOwned(ownerId, sessionId);
    const removedLogs = await this.logs.deleteBySession(sessionId);
    await this.sessions.delete(sessionId);
    log.info(`Session ${sessionId} deleted with ${removedLogs} logs`);
  }

  async requireOwned(ownerId: IdentityId, sessionId: string): Promise<WorkoutSession> {
    const session = await this.sessions.findById(sessionId);
    if (!session || session.ownerIdentityId !== ownerId) {
      throw new NotFoundError("Workout session not found");
    }
    return session;
  }

  /** Keeps a completed session's volume in step with edits to its logs. */
  async refreshVolume(sessionId: string): Promise<void> {
    const session = await this.sessions.findById(sessionId);
    if (!session || session.status !== SessionStatus.COMPLETED) return;
    const logs = await this.logs.listBySession(sessionId);
    await this.sessions.update(sessionId, { totalVolume: this.calculator.totalVolume(logs) });
  }

  toView(session: WorkoutSession): WorkoutSessionView {
    return { ...session, date: this.calculator.sessionDate(session) };
  }

  private async transition(
    ownerId: IdentityId,
    sessionId: string,
    to: SessionStatus,
    buildPatch: (session: WorkoutSession) => Promise<Partial<NewWorkoutSession>>
  ): Promise<WorkoutSessionView> {
    const verb = ACTION_VERB[to] ?? to;
    const session = await this.requireOwned(ownerId, sessionId);
    if (!canTransition(session.status, to)) {
      throw new InvalidStateError(`Cannot ${verb} a session that is ${session.status}`);
    }

    const patch = await buildPatch(session);
    const updated = await this.sessions.transition(sessionId, ownerId, sourcesOf(to), {
      ...patch,
      status: to,
    });
    if (!updated) {
      // Another request moved the session first
      const latest = await this.requireOwned(ownerId, sessionId);
      throw new InvalidStateError(`Cannot ${verb} a session that is ${latest.status}`);
    }

    log.info(`Session ${sessionId}: ${session.status} -> ${to}`);
    return this.toView(updated);
  }
}
