import { SessionStatus } from "../../common/common-enum";
import { IdentityId } from "./reference.model";
import { Workout } from "./workout.model";

export interface WorkoutSession {
  id: string;
  ownerIdentityId: IdentityId;
  workoutId: string | null;
  status: SessionStatus;
  scheduledDate: Date | null;
  startTime: Date | null;
  endTime: Date | null;
  actualDurationMinutes: number | null;
  rating: number | null;
  caloriesBurned: number | null;
  totalVolume: number;
  notes: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewWorkoutSession = Omit<WorkoutSession, "id" | "createdAt" | "updatedAt">;

export type SessionWorkoutSummary = Pick<
  Workout,
  "id" | "name" | "difficulty" | "estimatedDurationMinutes" | "totalExercises"
>;

export interface WorkoutSessionView extends WorkoutSession {
  date: string;
  workout?: SessionWorkoutSummary | null;
}
