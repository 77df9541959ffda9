import {
  ErrorDetail,
  NotFoundError,
  PermissionError,
  ValidationError,
} from "../common/errors";
import { ExerciseRepository, WorkoutRepository } from "../repositories/types";
import { Page } from "../types/model/page.model";
import { IdentityLookup, IdentityReference } from "../types/model/identity.model";
import { IdentityId, WeakReference } from "../types/model/reference.model";
import {
  NewWorkout,
  Workout,
  WorkoutDetail,
  WorkoutExercisePrescription,
} from "../types/model/workout.model";
import {
  PrescriptionInput,
  WorkoutFilters,
  WorkoutInput,
  WorkoutPatch,
} from "../types/request/workoutRequest";
import { WorkoutCalculator, workoutCalculator } from "../utils/calculators";
import { WORKOUT_CONSTANTS } from "../utils/constants";
import { logger } from "../utils/logger";
import { toPage, toSlice } from "../utils/pagination";
import { uniqueStrings } from "../utils/text";
import { canViewExercise, toExerciseSummary } from "./exercise.service";

const log = logger.child("WorkoutTemplates");

const isPositiveInteger = (value: number) => Number.isInteger(value) && value >= 1;
const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;

export const canViewWorkout = (workout: Workout, viewerId: IdentityId | null) =>
  workout.isPublic || (viewerId !== null && workout.ownerIdentityId === viewerId);

/**
 * Checks a prescription list and returns it normalized and sorted by order.
 * Nothing is persisted when this throws.
 */
export function validatePrescriptions(
  inputs: readonly PrescriptionInput[]
): WorkoutExercisePrescription[] {
  const issues: ErrorDetail[] = [];
  const seenOrders = new Set<number>();

  const prescriptions = inputs.map((input, index) => {
    const at = (field: string) => `exercises[${index}].${field}`;

    if (!input.exerciseId || input.exerciseId.trim().length === 0) {
      issues.push({ path: at("exerciseId"), message: "exerciseId is required" });
    }
    if (!isPositiveInteger(input.order)) {
      issues.push({ path: at("order"), message: "order must be a positive integer" });
    } else if (seenOrders.has(input.order)) {
      issues.push({ path: at("order"), message: "duplicate order" });
    } else {
      seenOrders.add(input.order);
    }

    const targetSets = input.targetSets ?? WORKOUT_CONSTANTS.DEFAULT_TARGET_SETS;
    if (!isPositiveInteger(targetSets)) {
      issues.push({ path: at("targetSets"), message: "targetSets must be a positive integer" });
    }

    const repsMin = input.targetRepsMin ?? null;
    const repsMax = input.targetRepsMax ?? null;
    if (repsMin !== null && !isNonNegativeInteger(repsMin)) {
      issues.push({ path: at("targetRepsMin"), message: "targetRepsMin must be a non-negative integer" });
    }
    if (repsMax !== null && !isNonNegativeInteger(repsMax)) {
      issues.push({ path: at("targetRepsMax"), message: "targetRepsMax must be a non-negative integer" });
    }
    if (repsMin !== null && repsMax !== null && repsMax < repsMin) {
      issues.push({
        path: at("targetRepsMax"),
        message: "targetRepsMax must be greater than or equal to targetRepsMin",
      });
    }

    const targetWeight = input.targetWeight ?? 0;
    if (!(targetWeight >= 0)) {
      issues.push({ path: at("targetWeight"), message: "targetWeight must be >= 0" });
    }
    const restSeconds = input.restSeconds ?? WORKOUT_CONSTANTS.DEFAULT_REST_SECONDS;
    if (!isNonNegativeInteger(restSeconds)) {
      issues.push({ path: at("restSeconds"), message: "restSeconds must be a non-negative integer" });
    }

    return {
      exerciseId: input.exerciseId,
      order: input.order,
      targetSets,
      targetRepsMin: repsMin,
      targetRepsMax: repsMax,
      targetWeight,
      restSeconds,
      notes: input.notes ?? "",
    };
  });

  if (issues.length > 0) {
    throw new ValidationError(issues[0].message, issues);
  }
  return prescriptions.sort((a, b) => a.order - b.order);
}

const requireName = (name: string | undefined): string => {
  const trimmed = name?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new ValidationError("Workout name is required", [
      { path: "name", message: "must not be empty" },
    ]);
  }
  return trimmed;
};

/**
 * Owns workout templates and their embedded prescription lists. Derived
 * fields are always recomputed here and never taken from the client.
 */
export class WorkoutService {
  constructor(
    private readonly workouts: WorkoutRepository,
    private readonly exercises: ExerciseRepository,
    private readonly findIdentity: IdentityLookup,
    private readonly calculator: WorkoutCalculator = workoutCalculator
  ) {}

  async create(ownerId: IdentityId, input: WorkoutInput): Promise<Workout> {
    const name = requireName(input.name);
    const prescriptions = validatePrescriptions(input.exercises ?? []);
    await this.assertExercisesUsable(ownerId, prescriptions);

    const workout: NewWorkout = {
      name,
      description: input.description ?? "",
      ownerIdentityId: ownerId,
      difficulty: input.difficulty,
      tags: uniqueStrings(input.tags),
      isTemplate: input.isTemplate ?? true,
      isPublic: input.isPublic ?? false,
      ...this.withDerived(prescriptions),
    };

    const created = await this.workouts.create(workout);
    log.info(
      `Workout ${created.id} created by identity ${ownerId} with ${created.totalExercises} exercises`
    );
    return created;
  }

  async get(viewerId: IdentityId | null, workoutId: string): Promise<WorkoutDetail> {
    const workout = await this.findVisible(viewerId, workoutId);

    const ids = [...new Set(workout.exercises.map((p) => p.exerciseId))];
    const found = new Map(
      (await this.exercises.findByIds(ids)).map((exercise) => [exercise.id, exercise])
    );
    const ownerRef: IdentityReference = new WeakReference(
      workout.ownerIdentityId,
      this.findIdentity
    );
    const owner = await ownerRef.resolve();

    return {
      ...workout,
      ownerUsername: owner?.username ?? null,
      exercises: workout.exercises.map((prescription) => {
        const exercise = found.get(prescription.exerciseId);
        return {
          ...prescription,
          exercise: exercise ? toExerciseSummary(exercise) : null,
        };
      }),
    };
  }

  async list(viewerId: IdentityId | null, filters: WorkoutFilters = {}): Promise<Page<Workout>> {
    const { page, pageSize, slice } = toSlice(filters);
    const counted = await this.workouts.list(
      {
        visibleTo: viewerId,
        difficulty: filters.difficulty,
        tags: filters.tags ? uniqueStrings(filters.tags) : undefined,
        search: filters.search?.trim() || undefined,
      },
      slice
    );
    return toPage(counted, page, pageSize, (workout) => workout);
  }

  async update(ownerId: IdentityId, workoutId: string, patch: WorkoutPatch): Promise<Workout> {
    const current = await this.findOwned(ownerId, workoutId);

    const changes: Partial<NewWorkout> = {};
    if (patch.name !== undefined) changes.name = requireName(patch.name);
    if (patch.description !== undefined) changes.description = patch.description;
    if (patch.difficulty !== undefined) changes.difficulty = patch.difficulty;
    if (patch.tags !== undefined) changes.tags = uniqueStrings(patch.tags);
    if (patch.isTemplate !== undefined) changes.isTemplate = patch.isTemplate;
    if (patch.isPublic !== undefined) changes.isPublic = patch.isPublic;

    const prescriptions =
      patch.exercises !== undefined
        ? validatePrescriptions(patch.exercises)
        : current.exercises;
    if (patch.exercises !== undefined) {
      await this.assertExercisesUsable(ownerId, prescriptions);
    }
    Object.assign(changes, this.withDerived(prescriptions));

    const updated = await this.workouts.update(workoutId, changes);
    if (!updated) throw new NotFoundError("Workout not found");
    return updated;
  }

  /**
   * Copies a visible workout into the caller's library. The copy gets its
   * own prescription list and starts private.
   */
  async clone(ownerId: IdentityId, workoutId: string): Promise<Workout> {
    const original = await this.findVisible(ownerId, workoutId);
    const prescriptions = original.exercises.map((prescription) => ({ ...prescription }));

    const copy: NewWorkout = {
      name: `${original.name}${WORKOUT_CONSTANTS.COPY_SUFFIX}`,
      description: original.description,
      ownerIdentityId: ownerId,
      difficulty: original.difficulty,
      tags: [...original.tags],
      isTemplate: original.isTemplate,
      isPublic: false,
      ...this.withDerived(prescriptions),
    };

    const created = await this.workouts.create(copy);
    log.info(`Workout ${workoutId} cloned to ${created.id} for identity ${ownerId}`);
    return created;
  }

  async delete(ownerId: IdentityId, workoutId: string): Promise<void> {
    await this.findOwned(ownerId, workoutId);
    await this.workouts.delete(workoutId);
    log.info(`Workout ${workoutId} deleted by identity ${ownerId}`);
  }

  private withDerived(prescriptions: WorkoutExercisePrescription[]) {
    return {
      exercises: prescriptions,
      totalExercises: prescriptions.length,
      estimatedDurationMinutes: this.calculator.estimateDurationMinutes(prescriptions),
    };
  }

  private async findVisible(viewerId: IdentityId | null, workoutId: string): Promise<Workout> {
    const workout = await this.workouts.findById(workoutId);
    if (!workout || !canViewWorkout(workout, viewerId)) {
      throw new NotFoundError("Workout not found");
    }
    return workout;
  }

  private async findOwned(ownerId: IdentityId, workoutId: string): Promise<Workout> {
    const workout = await this.workouts.findById(workoutId);
    if (!workout) throw new NotFoundError("Workout not found");
    if (workout.ownerIdentityId !== ownerId) {
      throw new PermissionError("You do not have permission to modify this workout");
    }
    return workout;
  }

  private async assertExercisesUsable(
    ownerId: IdentityId,
    prescriptions: WorkoutExercisePrescription[]
  ) {
    const ids = [...new Set(prescriptions.map((p) => p.exerciseId))];
    if (ids.length === 0) return;

    const found = await this.exercises.findByIds(ids);
    const usable = new Set(
      found.filter((exercise) => canViewExercise(exercise, ownerId)).map((e) => e.id)
    );
    const issues = prescriptions
      .map((p, index) => ({ p, index }))
      .filter(({ p }) => !usable.has(p.exerciseId))
      .map(({ p, index }) => ({
        path: `exercises[${index}].exerciseId`,
        message: `unknown exercise ${p.exerciseId}`,
      }));
    if (issues.length > 0) {
      throw new ValidationError(issues[0].message, issues);
    }
  }
}
