import { Difficulty, ExerciseCategory, MuscleGroup, SessionStatus } from "../common/common-enum";
import { Exercise, NewExercise } from "../types/model/exercise.model";
import { ExerciseLog, NewExerciseLog } from "../types/model/exerciseLog.model";
import { Profile, ProfileFields, ProfilePatch } from "../types/model/profile.model";
import { IdentityId } from "../types/model/reference.model";
import { NewWorkout, Workout } from "../types/model/workout.model";
import { NewWorkoutSession, WorkoutSession } from "../types/model/workoutSession.model";

export interface Slice {
  skip: number;
  limit: number;
}

export interface Counted<T> {
  count: number;
  results: T[];
}

export interface ProfileRepository {
  findByIdentity(identityId: IdentityId): Promise<Profile | null>;
  /** Inserts unless a profile for the identity exists; returns whichever is stored. */
  createIfAbsent(identityId: IdentityId, fields: ProfileFields): Promise<Profile>;
  update(identityId: IdentityId, patch: ProfilePatch): Promise<Profile | null>;
}

export interface ExerciseQuery {
  /** null for anonymous callers: only shared exercises are visible */
  visibleTo: IdentityId | null;
  category?: ExerciseCategory;
  difficulty?: Difficulty;
  muscleGroup?: MuscleGroup;
  search?: string;
}

export interface ExerciseRepository {
  findById(id: string): Promise<Exercise | null>;
  findByIds(ids: string[]): Promise<Exercise[]>;
  create(exercise: NewExercise): Promise<Exercise>;
  update(id: string, patch: Partial<NewExercise>): Promise<Exercise | null>;
  delete(id: string): Promise<boolean>;
  list(query: ExerciseQuery, slice: Slice): Promise<Counted<Exercise>>;
}

export interface WorkoutQuery {
  visibleTo: IdentityId | null;
  difficulty?: Difficulty;
  tags?: string[];
  search?: string;
}

export interface WorkoutRepository {
  findById(id: string): Promise<Workout | null>;
  create(workout: NewWorkout): Promise<Workout>;
  update(id: string, patch: Partial<NewWorkout>): Promise<Workout | null>;
  delete(id: string): Promise<boolean>;
  list(query: WorkoutQuery, slice: Slice): Promise<Counted<Workout>>;
}

export interface SessionQuery {
  ownerIdentityId: IdentityId;
  status?: SessionStatus;
  dateFrom?: Date;
  dateTo?: Date;
}

export interface SessionRepository {
  findById(id: string): Promise<WorkoutSession | null>;
  create(session: NewWorkoutSession): Promise<WorkoutSession>;
  update(id: string, patch: Partial<NewWorkoutSession>): Promise<WorkoutSession | null>;
  /**
   * Conditional write: applies `patch` only while the session is owned by
   * `ownerIdentityId` and its status is one of `from`. Returns null otherwise.
   */
  transition(
    id: string,
    ownerIdentityId: IdentityId,
    from: SessionStatus[],
    patch: Partial<NewWorkoutSession>
  ): Promise<WorkoutSession | null>;
  delete(id: string): Promise<boolean>;
  /** Newest first by end time, else start time, else creation time. */
  list(query: SessionQuery, slice: Slice): Promise<Counted<WorkoutSession>>;
}

export interface ExerciseLogQuery {
  ownerIdentityId?: IdentityId;
  sessionId?: string;
  exerciseId?: string;
}

export interface ExerciseLogRepository {
  findById(id: string): Promise<ExerciseLog | null>;
  create(log: NewExerciseLog): Promise<ExerciseLog>;
  update(id: string, patch: Partial<NewExerciseLog>): Promise<ExerciseLog | null>;
  delete(id: string): Promise<boolean>;
  deleteBySession(sessionId: string): Promise<number>;
  listBySession(sessionId: string): Promise<ExerciseLog[]>;
  maxSetNumber(sessionId: string, exerciseId: string): Promise<number>;
  hasSetNumber(sessionId: string, exerciseId: string, setNumber: number): Promise<boolean>;
  list(query: ExerciseLogQuery, slice: Slice): Promise<Counted<ExerciseLog>>;
}
