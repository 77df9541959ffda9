import { Difficulty, ExerciseCategory, MuscleGroup } from "../../common/common-enum";
import { IdentityId } from "./reference.model";

export interface Exercise {
  id: string;
  name: string;
  description: string;
  category: ExerciseCategory;
  difficulty: Difficulty;
  primaryMuscles: MuscleGroup[];
  secondaryMuscles: MuscleGroup[];
  equipment: string[];
  instructions: string[];
  videoUrl: string;
  imageUrl: string;
  isCustom: boolean;
  ownerIdentityId: IdentityId | null; // null whenever isCustom is false
  isPublic: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewExercise = Omit<Exercise, "id" | "createdAt" | "updatedAt">;

export type ExerciseSummary = Pick<
  Exercise,
  "id" | "name" | "category" | "difficulty" | "primaryMuscles"
>;
