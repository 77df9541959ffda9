import { Difficulty, ExerciseCategory, MuscleGroup } from "../../common/common-enum";
import { PageRequest } from "../model/page.model";

export interface ExerciseInput {
  name: string;
  description?: string;
  category: ExerciseCategory;
  difficulty: Difficulty;
  primaryMuscles?: MuscleGroup[];
  secondaryMuscles?: MuscleGroup[];
  equipment?: string[];
  instructions?: string[];
  videoUrl?: string;
  imageUrl?: string;
  isPublic?: boolean;
  /** Only honoured for staff; everyone else always creates custom exercises. */
  isCustom?: boolean;
}

export type ExercisePatch = Partial<Omit<ExerciseInput, "isCustom">>;

export interface ExerciseFilters extends PageRequest {
  category?: ExerciseCategory;
  difficulty?: Difficulty;
  muscleGroup?: MuscleGroup;
  search?: string;
}
