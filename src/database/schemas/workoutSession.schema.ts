import mongoose, { Schema, Types } from "mongoose";
import { SessionStatus } from "../../common/common-enum";
import { WorkoutSession } from "../../types/model/workoutSession.model";

export type WorkoutSessionDoc = Omit<WorkoutSession, "id">;
export type LeanWorkoutSession = WorkoutSessionDoc & { _id: Types.ObjectId };

const WorkoutSessionSchema = new Schema<WorkoutSessionDoc>(
  {
    ownerIdentityId: { type: Number, required: true, index: true },
    workoutId: { type: String, default: null, index: true },
    status: {
      type: String,
      enum: Object.values(SessionStatus),
      default: SessionStatus.PLANNED,
    },
    scheduledDate: { type: Date, default: null },
    startTime: { type: Date, default: null },
    endTime: { type: Date, default: null },
    actualDurationMinutes: { type: Number, default: null },
    rating: { type: Number, default: null, min: 1, max: 5 },
    caloriesBurned: { type: Number, default: null, min: 0 },
    totalVolume: { type: Number, default: 0, min: 0 },
    notes: { type: String, default: "" },
  },
  { timestamps: true, collection: "workout_sessions" }
);

WorkoutSessionSchema.index({ ownerIdentityId: 1, status: 1 });
WorkoutSessionSchema.index({ ownerIdentityId: 1, endTime: -1 });

export const WorkoutSessionModel = mongoose.model<WorkoutSessionDoc>("WorkoutSession", WorkoutSessionSchema);
