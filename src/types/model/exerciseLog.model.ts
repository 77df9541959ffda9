import { ErrorKind } from "../../common/errors";
import { IdentityId } from "./reference.model";

export interface ExerciseLog {
  id: string;
  sessionId: string;
  exerciseId: string;
  ownerIdentityId: IdentityId;
  setNumber: number;
  reps: number | null;
  weight: number | null; // kg
  durationSeconds: number | null;
  distance: number | null; // km
  perceivedExertion: number | null;
  notes: string;
  completedAt: Date;
  createdAt: Date;
}

export type NewExerciseLog = Omit<ExerciseLog, "id" | "createdAt">;

export type BulkLogItemResult =
  | { index: number; status: "created"; log: ExerciseLog }
  | { index: number; status: "failed"; error: { kind: ErrorKind; message: string } };

export interface BulkLogResult {
  created: number;
  failed: number;
  results: BulkLogItemResult[];
}
