import { NotFoundError, PermissionError, ValidationError } from "../common/errors";
import { ExerciseRepository } from "../repositories/types";
import { Exercise, ExerciseSummary, NewExercise } from "../types/model/exercise.model";
import { Caller } from "../types/model/identity.model";
import { Page } from "../types/model/page.model";
import { IdentityId } from "../types/model/reference.model";
import {
  ExerciseFilters,
  ExerciseInput,
  ExercisePatch,
} from "../types/request/exerciseRequest";
import { logger } from "../utils/logger";
import { toPage, toSlice } from "../utils/pagination";
import { uniqueStrings, uniqueValues } from "../utils/text";

const log = logger.child("Catalog");

export const toExerciseSummary = (exercise: Exercise): ExerciseSummary => ({
  id: exercise.id,
  name: exercise.name,
  category: exercise.category,
  difficulty: exercise.difficulty,
  primaryMuscles: exercise.primaryMuscles,
});

export const canViewExercise = (exercise: Exercise, viewerId: IdentityId | null): boolean =>
  !exercise.isCustom ||
  exercise.isPublic ||
  (viewerId !== null && exercise.ownerIdentityId === viewerId);

const requireName = (name: string | undefined): string => {
  const trimmed = name?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new ValidationError("Exercise name is required", [
      { path: "name", message: "must not be empty" },
    ]);
  }
  return trimmed;
};

/**
 * Exercise reference data. Shared (non-custom) exercises are maintained by
 * staff; anyone else creates custom exercises that only they may change.
 */
export class ExerciseService {
  constructor(private readonly exercises: ExerciseRepository) {}

  async create(caller: Caller, input: ExerciseInput): Promise<Exercise> {
    if (input.isCustom === false && !caller.isStaff) {
      throw new PermissionError("Only staff can create shared exercises");
    }
    const isCustom = caller.isStaff ? input.isCustom ?? false : true;

    const exercise: NewExercise = {
      name: requireName(input.name),
      description: input.description ?? "",
      category: input.category,
      difficulty: input.difficulty,
      primaryMuscles: uniqueValues(input.primaryMuscles),
      secondaryMuscles: uniqueValues(input.secondaryMuscles),
      equipment: uniqueStrings(input.equipment),
      instructions: [...(input.instructions ?? [])],
      videoUrl: input.videoUrl ?? "",
      imageUrl: input.imageUrl ?? "",
      isCustom,
      ownerIdentityId: isCustom ? caller.id : null,
      isPublic: isCustom ? input.isPublic ?? false : true,
    };

    const created = await this.exercises.create(exercise);
    log.info(`Exercise ${created.id} created by identity ${caller.id}`);
    return created;
  }

  async get(caller: Caller | null, exerciseId: string): Promise<Exercise> {
    const exercise = await this.exercises.findById(exerciseId);
    if (!exercise || !canViewExercise(exercise, caller?.id ?? null)) {
      throw new NotFoundError("Exercise not found");
    }
    return exercise;
  }

  async list(caller: Caller | null, filters: ExerciseFilters = {}): Promise<Page<Exercise>> {
    const { page, pageSize, slice } = toSlice(filters);
    const counted = await this.exercises.list(
      {
        visibleTo: caller?.id ?? null,
        category: filters.category,
        difficulty: filters.difficulty,
        muscleGroup: filters.muscleGroup,
        search: filters.search?.trim() || undefined,
      },
      slice
    );
    return toPage(counted, page, pageSize, (exercise) => exercise);
  }

  async update(caller: Caller, exerciseId: string, patch: ExercisePatch): Promise<Exercise> {
    const exercise = await this.get(caller, exerciseId);
    this.assertCanMutate(caller, exercise);

    const changes: Partial<NewExercise> = {};
    if (patch.name !== undefined) changes.name = requireName(patch.name);
    if (patch.description !== undefined) changes.description = patch.description;
    if (patch.category !== undefined) changes.category = patch.category;
    if (patch.difficulty !== undefined) changes.difficulty = patch.difficulty;
    if (patch.primaryMuscles !== undefined) {
      changes.primaryMuscles = uniqueValues(patch.primaryMuscles);
    }
    if (patch.secondaryMuscles !== undefined) {
      changes.secondaryMuscles = uniqueValues(patch.secondaryMuscles);
    }
    if (patch.equipment !== undefined) changes.equipment = uniqueStrings(patch.equipment);
    if (patch.instructions !== undefined) changes.instructions = [...patch.instructions];
    if (patch.videoUrl !== undefined) changes.videoUrl = patch.videoUrl;
    if (patch.imageUrl !== undefined) changes.imageUrl = patch.imageUrl;
    // Shared exercises are always public
    if (patch.isPublic !== undefined && exercise.isCustom) changes.isPublic = patch.isPublic;

    const updated = await this.exercises.update(exerciseId, changes);
    if (!updated) throw new NotFoundError("Exercise not found");
    return updated;
  }

  /**
   * Workouts and logs that reference the exercise are left alone; their
   * references dangle and resolve to nothing from then on.
   */
  async delete(caller: Caller, exerciseId: string): Promise<void> {
    const exercise = await this.get(caller, exerciseId);
    const isOwner = exercise.isCustom && exercise.ownerIdentityId === caller.id;
    if (!isOwner && !caller.isStaff) {
      throw new PermissionError("You do not have permission to delete this exercise");
    }
    await this.exercises.delete(exerciseId);
    log.info(`Exercise ${exerciseId} deleted by identity ${caller.id}`);
  }

  private assertCanMutate(caller: Caller, exercise: Exercise) {
    const allowed = exercise.isCustom
      ? exercise.ownerIdentityId === caller.id
      : caller.isStaff;
    if (!allowed) {
      throw new PermissionError("You do not have permission to modify this exercise");
    }
  }
}
