import { SessionStatus } from "../common/common-enum";
import { Clock, systemClock } from "../common/clock";
import {
  ErrorDetail,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../common/errors";
import { ExerciseLogRepository, ExerciseRepository } from "../repositories/types";
import {
  BulkLogItemResult,
  BulkLogResult,
  ExerciseLog,
  NewExerciseLog,
} from "../types/model/exerciseLog.model";
import { Caller } from "../types/model/identity.model";
import { Page } from "../types/model/page.model";
import { IdentityId } from "../types/model/reference.model";
import {
  BulkLogItem,
  ExerciseLogFilters,
  ExerciseLogInput,
  ExerciseLogPatch,
} from "../types/request/exerciseLogRequest";
import { LOG_CONSTANTS, PAGINATION } from "../utils/constants";
import { logger } from "../utils/logger";
import { toPage, toSlice } from "../utils/pagination";
import { canViewExercise } from "./exercise.service";
import { SessionService } from "./session.service";

const log = logger.child("LogAggregator");

type Metrics = Pick<NewExerciseLog, "reps" | "weight" | "durationSeconds" | "distance">;

const METRIC_FIELDS = ["reps", "weight", "durationSeconds", "distance"] as const;

const hasMetric = (metrics: Metrics) =>
  METRIC_FIELDS.some((field) => metrics[field] !== null);

/** Per-item failures a bulk request reports instead of aborting. */
const isItemFailure = (
  error: unknown
): error is ValidationError | InvalidStateError | NotFoundError =>
  error instanceof ValidationError ||
  error instanceof InvalidStateError ||
  error instanceof NotFoundError;

type Measurements = Pick<NewExerciseLog, "setNumber" | "perceivedExertion"> & Metrics;

function validateMeasurements(values: Measurements) {
  const issues: ErrorDetail[] = [];
  const nonNegative = (field: keyof Metrics, integer: boolean) => {
    const value = values[field];
    if (value === null) return;
    if (!(value >= 0) || (integer && !Number.isInteger(value))) {
      issues.push({
        path: field,
        message: `${field} must be a non-negative ${integer ? "integer" : "number"}`,
      });
    }
  };

  if (!Number.isInteger(values.setNumber) || values.setNumber < 1) {
    issues.push({ path: "setNumber", message: "setNumber must be a positive integer" });
  }
  nonNegative("reps", true);
  nonNegative("weight", false);
  nonNegative("durationSeconds", true);
  nonNegative("distance", false);

  const exertion = values.perceivedExertion;
  if (
    exertion !== null &&
    (!Number.isInteger(exertion) ||
      exertion < LOG_CONSTANTS.MIN_PERCEIVED_EXERTION ||
      exertion > LOG_CONSTANTS.MAX_PERCEIVED_EXERTION)
  ) {
    issues.push({
      path: "perceivedExertion",
      message: "perceivedExertion must be an integer between 1 and 10",
    });
  }
  if (!hasMetric(values)) {
    issues.push({
      path: "metrics",
      message: "At least one of reps, weight, durationSeconds or distance is required",
    });
  }

  if (issues.length > 0) {
    throw new ValidationError(issues[0].message, issues);
  }
}

/**
 * Records the individual sets of a session, one log per set, and keeps the
 * session's volume figure consistent once it has been completed.
 */
export class ExerciseLogService {
  constructor(
    private readonly logs: ExerciseLogRepository,
    private readonly exercises: ExerciseRepository,
    private readonly sessions: SessionService,
    private readonly clock: Clock = systemClock
  ) {}

  async createOne(
    ownerId: IdentityId,
    sessionId: string,
    input: ExerciseLogInput
  ): Promise<ExerciseLog> {
    const session = await this.sessions.requireOwned(ownerId, sessionId);
    if (session.status !== SessionStatus.IN_PROGRESS) {
      throw new InvalidStateError(`Cannot log sets for a session that is ${session.status}`);
    }

    const metrics: Metrics = {
      reps: input.reps ?? null,
      weight: input.weight ?? null,
      durationSeconds: input.durationSeconds ?? null,
      distance: input.distance ?? null,
    };
    if (!hasMetric(metrics)) {
      throw new ValidationError(
        "At least one of reps, weight, durationSeconds or distance is required",
        [{ path: "metrics", message: "no metric supplied" }]
      );
    }

    await this.requireExercise(ownerId, input.exerciseId);

    let setNumber = input.setNumber;
    if (setNumber === undefined) {
      setNumber = (await this.logs.maxSetNumber(sessionId, input.exerciseId)) + 1;
    } else if (await this.logs.hasSetNumber(sessionId, input.exerciseId, setNumber)) {
      throw new ValidationError(`set ${setNumber} is already logged for this exercise`, [
        { path: "setNumber", message: "duplicate setNumber" },
      ]);
    }

    const entry: NewExerciseLog = {
      sessionId,
      exerciseId: input.exerciseId,
      ownerIdentityId: ownerId,
      setNumber,
      ...metrics,
      perceivedExertion: input.perceivedExertion ?? null,
      notes: input.notes ?? "",
      completedAt: input.completedAt ?? this.clock.now(),
    };
    validateMeasurements(entry);

    return this.logs.create(entry);
  }

  /**
   * Logs each item on its own: a failing item is reported at its index and
   * the rest still go through. A store outage aborts the whole request.
   */
  async createBulk(
    ownerId: IdentityId,
    sessionId: string,
    inputs: readonly BulkLogItem[]
  ): Promise<BulkLogResult> {
    if (inputs.length < 1 || inputs.length > LOG_CONSTANTS.MAX_BULK_ITEMS) {
      throw new ValidationError(
        `Bulk requests take between 1 and ${LOG_CONSTANTS.MAX_BULK_ITEMS} logs`,
        [{ path: "logs", message: `got ${inputs.length} items` }]
      );
    }

    const results: BulkLogItemResult[] = [];
    for (const [index, input] of inputs.entries()) {
      try {
        if (input instanceof ValidationError) throw input;
        const created = await this.createOne(ownerId, sessionId, input);
        results.push({ index, status: "created", log: created });
      } catch (error) {
        if (!isItemFailure(error)) throw error;
        results.push({
          index,
          status: "failed",
          error: { kind: error.kind, message: error.message },
        });
      }
    }

    const created = results.filter((result) => result.status === "created").length;
    log.info(
      `Bulk log for session ${sessionId}: ${created} created, ${results.length - created} failed`
    );
    return { created, failed: results.length - created, results };
  }

  async get(caller: Caller, logId: string): Promise<ExerciseLog> {
    const entry = await this.logs.findById(logId);
    if (!entry || (entry.ownerIdentityId !== caller.id && !caller.isStaff)) {
      throw new NotFoundError("Exercise log not found");
    }
    return entry;
  }

  /** Staff see every log; everyone else only their own. */
  async list(caller: Caller, filters: ExerciseLogFilters = {}): Promise<Page<ExerciseLog>> {
    const { page, pageSize, slice } = toSlice(filters, PAGINATION.DEFAULT_LOG_PAGE_SIZE);
    const counted = await this.logs.list(
      {
        ownerIdentityId: caller.isStaff ? undefined : caller.id,
        sessionId: filters.sessionId,
        exerciseId: filters.exerciseId,
      },
      slice
    );
    return toPage(counted, page, pageSize, (entry) => entry);
  }

  async update(ownerId: IdentityId, logId: string, patch: ExerciseLogPatch): Promise<ExerciseLog> {
    const current = await this.requireOwnedLog(ownerId, logId);

    const merged: NewExerciseLog = {
      sessionId: current.sessionId,
      exerciseId: current.exerciseId,
      ownerIdentityId: current.ownerIdentityId,
      setNumber: patch.setNumber ?? current.setNumber,
      reps: patch.reps !== undefined ? patch.reps : current.reps,
      weight: patch.weight !== undefined ? patch.weight : current.weight,
      durationSeconds:
        patch.durationSeconds !== undefined ? patch.durationSeconds : current.durationSeconds,
      distance: patch.distance !== undefined ? patch.distance : current.distance,
      perceivedExertion:
        patch.perceivedExertion !== undefined ? patch.perceivedExertion : current.perceivedExertion,
      notes: patch.notes ?? current.notes,
      completedAt: patch.completedAt ?? current.completedAt,
    };
    validateMeasurements(merged);

    if (
      merged.setNumber !== current.setNumber &&
      (await this.logs.hasSetNumber(current.sessionId, current.exerciseId, merged.setNumber))
    ) {
      throw new ValidationError(`set ${merged.setNumber} is already logged for this exercise`, [
        { path: "setNumber", message: "duplicate setNumber" },
      ]);
    }

    const updated = await this.logs.update(logId, merged);
    if (!updated) throw new NotFoundError("Exercise log not found");
    await this.sessions.refreshVolume(current.sessionId);
    return updated;
  }

  async delete(ownerId: IdentityId, logId: string): Promise<void> {
    const current = await this.requireOwnedLog(ownerId, logId);
    await this.logs.delete(logId);
    await this.sessions.refreshVolume(current.sessionId);
  }

  private async requireOwnedLog(ownerId: IdentityId, logId: string): Promise<ExerciseLog> {
    const entry = await this.logs.findById(logId);
    if (!entry || entry.ownerIdentityId !== ownerId) {
      throw new NotFoundError("Exercise log not found");
    }
    return entry;
  }

  private async requireExercise(ownerId: IdentityId, exerciseId: string) {
    const exercise = exerciseId ? await this.exercises.findById(exerciseId) : null;
    if (!exercise || !canViewExercise(exercise, ownerId)) {
      throw new ValidationError(`unknown exercise ${exerciseId}`, [
        { path: "exerciseId", message: "exercise does not exist" },
      ]);
    }
  }
}
