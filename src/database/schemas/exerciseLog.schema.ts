import mongoose, { Schema, Types } from "mongoose";
import { ExerciseLog } from "../../types/model/exerciseLog.model";

export type ExerciseLogDoc = Omit<ExerciseLog, "id">;
export type LeanExerciseLog = ExerciseLogDoc & { _id: Types.ObjectId };

const ExerciseLogSchema = new Schema<ExerciseLogDoc>(
  {
    sessionId: { type: String, required: true, index: true },
    exerciseId: { type: String, required: true, index: true },
    ownerIdentityId: { type: Number, required: true, index: true },
    setNumber: { type: Number, required: true, min: 1 },
    reps: { type: Number, default: null, min: 0 },
    weight: { type: Number, default: null, min: 0 },
    durationSeconds: { type: Number, default: null, min: 0 },
    distance: { type: Number, default: null, min: 0 },
    perceivedExertion: { type: Number, default: null, min: 1, max: 10 },
    notes: { type: String, default: "" },
    completedAt: { type: Date, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: "exercise_logs" }
);

ExerciseLogSchema.index({ sessionId: 1, exerciseId: 1, setNumber: 1 }, { unique: true });
ExerciseLogSchema.index({ exerciseId: 1, createdAt: -1 });

export const ExerciseLogModel = mongoose.model<ExerciseLogDoc>("ExerciseLog", ExerciseLogSchema);
