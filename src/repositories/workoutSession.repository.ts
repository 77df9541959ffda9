import { FilterQuery, PipelineStage } from "mongoose";
import { SessionStatus } from "../common/common-enum";
import {
  LeanWorkoutSession,
  WorkoutSessionDoc,
  WorkoutSessionModel,
} from "../database/schemas/workoutSession.schema";
import { IdentityId } from "../types/model/reference.model";
import { NewWorkoutSession, WorkoutSession } from "../types/model/workoutSession.model";
import { STORE_NAMES } from "../utils/constants";
import { isDocumentId, withStore } from "./storeGuard";
import { Counted, SessionQuery, SessionRepository, Slice } from "./types";

const toSession = (doc: LeanWorkoutSession): WorkoutSession => ({
  id: doc._id.toString(),
  ownerIdentityId: doc.ownerIdentityId,
  workoutId: doc.workoutId ?? null,
  status: doc.status,
  scheduledDate: doc.scheduledDate ?? null,
  startTime: doc.startTime ?? null,
  endTime: doc.endTime ?? null,
  actualDurationMinutes: doc.actualDurationMinutes ?? null,
  rating: doc.rating ?? null,
  caloriesBurned: doc.caloriesBurned ?? null,
  totalVolume: doc.totalVolume,
  notes: doc.notes,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

// Same precedence as the session's derived `date`
const SORT_DATE = {
  $ifNull: ["$endTime", { $ifNull: ["$startTime", "$createdAt"] }],
};

export class MongoSessionRepository implements SessionRepository {
  async findById(id: string): Promise<WorkoutSession | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await WorkoutSessionModel.findById(id).lean<LeanWorkoutSession>();
      return doc ? toSession(doc) : null;
    });
  }

  async create(session: NewWorkoutSession): Promise<WorkoutSession> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const created = await WorkoutSessionModel.create(session);
      return toSession(created.toObject());
    });
  }

  async update(id: string, patch: Partial<NewWorkoutSession>): Promise<WorkoutSession | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await WorkoutSessionModel.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanWorkoutSession>();
      return doc ? toSession(doc) : null;
    });
  }

  async transition(
    id: string,
    ownerIdentityId: IdentityId,
    from: SessionStatus[],
    patch: Partial<NewWorkoutSession>
  ): Promise<WorkoutSession | null> {
    if (!isDocumentId(id)) return null;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const doc = await WorkoutSessionModel.findOneAndUpdate(
        { _id: id, ownerIdentityId, status: { $in: from } },
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanWorkoutSession>();
      return doc ? toSession(doc) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    if (!isDocumentId(id)) return false;
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const result = await WorkoutSessionModel.deleteOne({ _id: id });
      return result.deletedCount > 0;
    });
  }

  async list(query: SessionQuery, slice: Slice): Promise<Counted<WorkoutSession>> {
    return withStore(STORE_NAMES.DOCUMENT, async () => {
      const match: FilterQuery<WorkoutSessionDoc> = {
        ownerIdentityId: query.ownerIdentityId,
      };
      if (query.status) match.status = query.status;

      const range: Record<string, Date> = {};
      if (query.dateFrom) range.$gte = query.dateFrom;
      if (query.dateTo) range.$lte = query.dateTo;

      const pipeline: PipelineStage[] = [
        { $match: match },
        { $addFields: { sortDate: SORT_DATE } },
      ];
      if (Object.keys(range).length > 0) {
        pipeline.push({ $match: { sortDate: range } });
      }

      const [counted, docs] = await Promise.all([
        WorkoutSessionModel.aggregate<{ total: number }>([
          ...pipeline,
          { $count: "total" },
        ]),
        WorkoutSessionModel.aggregate<LeanWorkoutSession>([
          ...pipeline,
          { $sort: { sortDate: -1, _id: -1 } },
          { $skip: slice.skip },
          { $limit: slice.limit },
          { $project: { sortDate: 0 } },
        ]),
      ]);
      return { count: counted[0]?.total ?? 0, results: docs.map(toSession) };
    });
  }
}
