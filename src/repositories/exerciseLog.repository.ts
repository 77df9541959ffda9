import { FilterQuery } from "mongoose";
import { ValidationError } from "../common/errors";
import {
  ExerciseLogDoc,
  ExerciseLogModel,
  LeanExerciseLog,
} from "../database/schemas/exerciseLog.schema";
import { ExerciseLog, NewExerciseLog } from "../types/model/exerciseLog.model";
import { STORE_NAMES } from "../utils/constants";
import { isDocumentId, isDuplicateKeyError, withStore } from "./storeGuard";
import { Counted, ExerciseLogQuery, ExerciseLogRepository, Slice } from "./types";

const toExerciseLog = (doc: LeanExerciseLog): ExerciseLog => ({
  id: doc._id.toString(),
  sessionId: doc.sessionId,
  exerciseId: doc.exerciseId,
  ownerIdentityId: doc.ownerIdentityId,
  setNumber: doc.setNumber,
  reps: doc.reps ?? null,
  weight: doc.weight ?? null,
  durationSeconds: doc.durationSeconds ?? null,
  distance: doc.distance ?? null,
  perceivedExertion: doc.perceivedExertion ?? null,
  notes: doc.notes,
  completedAt: doc.completedAt,
  createdAt: doc.createdAt,
});

export class MongoExerciseLogRepository implements ExerciseLogRepository {
  async findById(id: string): Promise<ExerciseLog | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await ExerciseLogModel.findById(id).lean<LeanExerciseLog>();
      return doc ? toExerciseLog(doc) : null;
    });
  }

  async create(log: NewExerciseLog): Promise<ExerciseLog> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      try {
        const created = await ExerciseLogModel.create(log);
        return toExerciseLog(created.toObject());
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw new ValidationError(`set ${log.setNumber} is already logged for this exercise`, [
            { path: "setNumber", message: "duplicate setNumber" },
          ]);
        }
        throw error;
      }
    });
  }

  async update(id: string, patch: Partial<NewExerciseLog>): Promise<ExerciseLog | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await ExerciseLogModel.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanExerciseLog>();
      return doc ? toExerciseLog(doc) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    if (!isDocumentId(id)) return false;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const result = await ExerciseLogModel.deleteOne({ _id: id });
      return result.deletedCount > 0;
    });
  }

  async deleteBySession(sessionId: string): Promise<number> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const result = await ExerciseLogModel.deleteMany({ sessionId });
      return result.deletedCount;
    });
  }

  async listBySession(sessionId: string): Promise<ExerciseLog[]> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const docs = await ExerciseLogModel.find({ sessionId })
        .sort({ exerciseId: 1, setNumber: 1 })
        .lean<LeanExerciseLog[]>();
      return docs.map(toExerciseLog);
    });
  }

  async maxSetNumber(sessionId: string, exerciseId: string): Promise<number> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await ExerciseLogModel.findOne({ sessionId, exerciseId })
        .sort({ setNumber: -1 })
        .lean<LeanExerciseLog>();
      return doc?.setNumber ?? 0;
    });
  }

  async hasSetNumber(sessionId: string, exerciseId: string, setNumber: number): Promise<boolean> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const found = await ExerciseLogModel.exists({ sessionId, exerciseId, setNumber });
      return found !== null;
    });
  }

  async list(query: ExerciseLogQuery, slice: Slice): Promise<Counted<ExerciseLog>> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const filter: FilterQuery<ExerciseLogDoc> = {};
      if (query.ownerIdentityId !== undefined) filter.ownerIdentityId = query.ownerIdentityId;
      if (query.sessionId) filter.sessionId = query.sessionId;
      if (query.exerciseId) filter.exerciseId = query.exerciseId;

      const [count, docs] = await Promise.all([
        ExerciseLogModel.countDocuments(filter),
        ExerciseLogModel.find(filter)
          .sort({ createdAt: -1 })
          .skip(slice.skip)
          .limit(slice.limit)
          .lean<LeanExerciseLog[]>(),
      ]);
      return { count, results: docs.map(toExerciseLog) };
    });
  }
}
