import { FilterQuery } from "mongoose";
import { ExerciseDoc, ExerciseModel, LeanExercise } from "../database/schemas/exercise.schema";
import { Exercise, NewExercise } from "../types/model/exercise.model";
import { STORE_NAMES } from "../utils/constants";
import { escapeRegex } from "../utils/text";
import { isDocumentId, withStore } from "./storeGuard";
import { Counted, ExerciseQuery, ExerciseRepository, Slice } from "./types";

const toExercise = (doc: LeanExercise): Exercise => ({
  id: doc._id.toString(),
  name: doc.name,
  description: doc.description,
  category: doc.category,
  difficulty: doc.difficulty,
  primaryMuscles: [...doc.primaryMuscles],
  secondaryMuscles: [...doc.secondaryMuscles],
  equipment: [...doc.equipment],
  instructions: [...doc.instructions],
  videoUrl: doc.videoUrl,
  imageUrl: doc.imageUrl,
  isCustom: doc.isCustom,
  ownerIdentityId: doc.ownerIdentityId ?? null,
  isPublic: doc.isPublic,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const buildFilter = (query: ExerciseQuery): FilterQuery<ExerciseDoc> => {
  const visibility: FilterQuery<ExerciseDoc>[] = [{ isCustom: false }, { isPublic: true }];
  if (query.visibleTo !== null) {
    visibility.push({ ownerIdentityId: query.visibleTo });
  }

  const filter: FilterQuery<ExerciseDoc> = { $or: visibility };
  if (query.category) filter.category = query.category;
  if (query.difficulty) filter.difficulty = query.difficulty;
  if (query.muscleGroup) {
    filter.$and = [
      {
        $or: [
          { primaryMuscles: query.muscleGroup },
          { secondaryMuscles: query.muscleGroup },
        ],
      },
    ];
  }
  if (query.search) {
    filter.name = { $regex: escapeRegex(query.search), $options: "i" };
  }
  return filter;
};

export class MongoExerciseRepository implements ExerciseRepository {
  async findById(id: string): Promise<Exercise | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await ExerciseModel.findById(id).lean<LeanExercise>();
      return doc ? toExercise(doc) : null;
    });
  }

  async findByIds(ids: string[]): Promise<Exercise[]> {
    const valid = ids.filter(isDocumentId);
    if (valid.length === 0) return [];
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const docs = await ExerciseModel.find({ _id: { $in: valid } }).lean<LeanExercise[]>();
      return docs.map(toExercise);
    });
  }

  async create(exercise: NewExercise): Promise<Exercise> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const created = await ExerciseModel.create(exercise);
      return toExercise(created.toObject());
    });
  }

  async update(id: string, patch: Partial<NewExercise>): Promise<Exercise | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await ExerciseModel.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanExercise>();
      return doc ? toExercise(doc) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    if (!isDocumentId(id)) return false;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const result = await ExerciseModel.deleteOne({ _id: id });
      return result.deletedCount > 0;
    });
  }

  async list(query: ExerciseQuery, slice: Slice): Promise<Counted<Exercise>> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const filter = buildFilter(query);
      const [count, docs] = await Promise.all([
        ExerciseModel.countDocuments(filter),
        ExerciseModel.find(filter)
          .sort({ createdAt: -1 })
          .skip(slice.skip)
          .limit(slice.limit)
          .lean<LeanExercise[]>(),
      ]);
      return { count, results: docs.map(toExercise) };
    });
  }
}
