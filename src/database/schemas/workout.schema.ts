import mongoose, { Schema, Types } from "mongoose";
import { Difficulty } from "../../common/common-enum";
import { Workout, WorkoutExercisePrescription } from "../../types/model/workout.model";

export type WorkoutDoc = Omit<Workout, "id">;
export type LeanWorkout = WorkoutDoc & { _id: Types.ObjectId };

// Embedded, so a template is always read together with its prescriptions
const PrescriptionSchema = new Schema<WorkoutExercisePrescription>(
  {
    exerciseId: { type: String, required: true },
    order: { type: Number, required: true, min: 1 },
    targetSets: { type: Number, required: true, min: 1 },
    targetRepsMin: { type: Number, default: null, min: 0 },
    targetRepsMax: { type: Number, default: null, min: 0 },
    targetWeight: { type: Number, default: 0, min: 0 },
    restSeconds: { type: Number, default: 60, min: 0 },
    notes: { type: String, default: "" },
  },
  { _id: false }
);

const WorkoutSchema = new Schema<WorkoutDoc>(
  {
    name: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    ownerIdentityId: { type: Number, required: true, index: true },
    exercises: { type: [PrescriptionSchema], default: [] },
    difficulty: { type: String, enum: Object.values(Difficulty), required: true },
    estimatedDurationMinutes: { type: Number, required: true, min: 0 },
    tags: { type: [String], default: [] },
    isTemplate: { type: Boolean, default: true },
    isPublic: { type: Boolean, default: false, index: true },
    totalExercises: { type: Number, required: true, min: 0 },
  },
  { timestamps: true, collection: "workouts" }
);

WorkoutSchema.index({ createdAt: -1 });

export const WorkoutModel = mongoose.model<WorkoutDoc>("Workout", WorkoutSchema);
