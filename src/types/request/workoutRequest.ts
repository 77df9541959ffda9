import { Difficulty } from "../../common/common-enum";
import { PageRequest } from "../model/page.model";

export interface PrescriptionInput {
  exerciseId: string;
  order: number;
  targetSets?: number;
  targetRepsMin?: number | null;
  targetRepsMax?: number | null;
  targetWeight?: number;
  restSeconds?: number;
  notes?: string;
}

export interface WorkoutInput {
  name: string;
  description?: string;
  difficulty: Difficulty;
  exercises?: PrescriptionInput[];
  tags?: string[];
  isTemplate?: boolean;
  isPublic?: boolean;
  // Accepted from clients but always recomputed from `exercises`
  estimatedDurationMinutes?: number;
  totalExercises?: number;
}

export type WorkoutPatch = Partial<WorkoutInput>;

export interface WorkoutFilters extends PageRequest {
  difficulty?: Difficulty;
  tags?: string[];
  search?: string;
}
