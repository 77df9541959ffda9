import { ValidationError } from "../../common/errors";
import { PageRequest } from "../model/page.model";

export interface ExerciseLogInput {
  exerciseId: string;
  setNumber?: number;
  reps?: number | null;
  weight?: number | null;
  durationSeconds?: number | null;
  distance?: number | null;
  perceivedExertion?: number | null;
  notes?: string;
  completedAt?: Date;
}

export type ExerciseLogPatch = Partial<Omit<ExerciseLogInput, "exerciseId">>;

export interface ExerciseLogFilters extends PageRequest {
  sessionId?: string;
  exerciseId?: string;
}

/** A bulk item that was already rejected while parsing stays in place as its error. */
export type BulkLogItem = ExerciseLogInput | ValidationError;
