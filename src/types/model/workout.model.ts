import { Difficulty } from "../../common/common-enum";
import { ExerciseSummary } from "./exercise.model";
import { IdentityId } from "./reference.model";

/** One planned exercise inside a workout. Not addressable on its own. */
export interface WorkoutExercisePrescription {
  exerciseId: string;
  order: number;
  targetSets: number;
  targetRepsMin: number | null;
  targetRepsMax: number | null;
  targetWeight: number;
  restSeconds: number;
  notes: string;
}

export interface Workout {
  id: string;
  name: string;
  description: string;
  ownerIdentityId: IdentityId;
  exercises: WorkoutExercisePrescription[];
  difficulty: Difficulty;
  estimatedDurationMinutes: number;
  tags: string[];
  isTemplate: boolean;
  isPublic: boolean;
  totalExercises: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewWorkout = Omit<Workout, "id" | "createdAt" | "updatedAt">;

export interface ResolvedPrescription extends WorkoutExercisePrescription {
  exercise: ExerciseSummary | null; // null once the exercise was deleted
}

export interface WorkoutDetail extends Omit<Workout, "exercises"> {
  exercises: ResolvedPrescription[];
  ownerUsername: string | null;
}
