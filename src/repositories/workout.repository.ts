import { FilterQuery } from "mongoose";
import { LeanWorkout, WorkoutDoc, WorkoutModel } from "../database/schemas/workout.schema";
import { NewWorkout, Workout } from "../types/model/workout.model";
import { STORE_NAMES } from "../utils/constants";
import { escapeRegex } from "../utils/text";
import { isDocumentId, withStore } from "./storeGuard";
import { Counted, Slice, WorkoutQuery, WorkoutRepository } from "./types";

const toWorkout = (doc: LeanWorkout): Workout => ({
  id: doc._id.toString(),
  name: doc.name,
  description: doc.description,
  ownerIdentityId: doc.ownerIdentityId,
  exercises: doc.exercises.map((item) => ({
    exerciseId: item.exerciseId,
    order: item.order,
    targetSets: item.targetSets,
    targetRepsMin: item.targetRepsMin ?? null,
    targetRepsMax: item.targetRepsMax ?? null,
    targetWeight: item.targetWeight,
    restSeconds: item.restSeconds,
    notes: item.notes,
  })),
  difficulty: doc.difficulty,
  estimatedDurationMinutes: doc.estimatedDurationMinutes,
  tags: [...doc.tags],
  isTemplate: doc.isTemplate,
  isPublic: doc.isPublic,
  totalExercises: doc.totalExercises,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const buildFilter = (query: WorkoutQuery): FilterQuery<WorkoutDoc> => {
  const filter: FilterQuery<WorkoutDoc> =
    query.visibleTo === null
      ? { isPublic: true }
      : { $or: [{ isPublic: true }, { ownerIdentityId: query.visibleTo }] };
  if (query.difficulty) filter.difficulty = query.difficulty;
  if (query.tags && query.tags.length > 0) filter.tags = { $in: query.tags };
  if (query.search) {
    filter.name = { $regex: escapeRegex(query.search), $options: "i" };
  }
  return filter;
};

export class MongoWorkoutRepository implements WorkoutRepository {
  async findById(id: string): Promise<Workout | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await WorkoutModel.findById(id).lean<LeanWorkout>();
      return doc ? toWorkout(doc) : null;
    });
  }

  async create(workout: NewWorkout): Promise<Workout> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const created = await WorkoutModel.create(workout);
      return toWorkout(created.toObject());
    });
  }

  async update(id: string, patch: Partial<NewWorkout>): Promise<Workout | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await WorkoutModel.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanWorkout>();
      return doc ? toWorkout(doc) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    if (!isDocumentId(id)) return false;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const result = await WorkoutModel.deleteOne({ _id: id });
      return result.deletedCount > 0;
    });
  }

  async list(query: WorkoutQuery, slice: Slice): Promise<Counted<Workout>> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const filter = buildFilter(query);
      const [count, docs] = await Promise.all([
        WorkoutModel.countDocuments(filter),
        WorkoutModel.find(filter)
          .sort({ createdAt: -1 })
          .skip(slice.skip)
          .limit(slice.limit)
          .lean<LeanWorkout[]>(),
      ]);
      return { count, results: docs.map(toWorkout) };
    });
  }
}
