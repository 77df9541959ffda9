import mongoose, { Schema, Types } from "mongoose";
import { Difficulty, ExerciseCategory, MuscleGroup } from "../../common/common-enum";
import { Exercise } from "../../types/model/exercise.model";

export type ExerciseDoc = Omit<Exercise, "id">;
export type LeanExercise = ExerciseDoc & { _id: Types.ObjectId };

const ExerciseSchema = new Schema<ExerciseDoc>(
  {
    name: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    category: { type: String, enum: Object.values(ExerciseCategory), required: true },
    difficulty: { type: String, enum: Object.values(Difficulty), required: true },
    primaryMuscles: { type: [String], enum: Object.values(MuscleGroup), default: [] },
    secondaryMuscles: { type: [String], enum: Object.values(MuscleGroup), default: [] },
    equipment: { type: [String], default: [] },
    instructions: { type: [String], default: [] },
    videoUrl: { type: String, default: "" },
    imageUrl: { type: String, default: "" },
    isCustom: { type: Boolean, default: false },
    ownerIdentityId: { type: Number, default: null, index: true },
    isPublic: { type: Boolean, default: true },
  },
  { timestamps: true, collection: "exercises" }
);

ExerciseSchema.index({ category: 1, difficulty: 1 });
ExerciseSchema.index({ name: 1 });

export const ExerciseModel = mongoose.model<ExerciseDoc>("Exercise", ExerciseSchema);
