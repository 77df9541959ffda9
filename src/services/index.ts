import { MongoExerciseRepository } from "../repositories/exercise.repository";
import { MongoExerciseLogRepository } from "../repositories/exerciseLog.repository";
import { MongoProfileRepository } from "../repositories/profile.repository";
import { MongoWorkoutRepository } from "../repositories/workout.repository";
import { MongoSessionRepository } from "../repositories/workoutSession.repository";
import { AuthService } from "./auth.service";
import { ExerciseService } from "./exercise.service";
import { ExerciseLogService } from "./exerciseLog.service";
import { PgIdentityStore } from "./identityStore.service";
import { ProfileStoreService } from "./profileStore.service";
import { SessionService } from "./session.service";
import { WorkoutService } from "./workout.service";

const exerciseRepository = new MongoExerciseRepository();
const workoutRepository = new MongoWorkoutRepository();
const sessionRepository = new MongoSessionRepository();
const exerciseLogRepository = new MongoExerciseLogRepository();

export const identityStore = new PgIdentityStore();
export const profileStoreService = new ProfileStoreService(new MongoProfileRepository());
export const authService = new AuthService(identityStore, profileStoreService);
export const exerciseService = new ExerciseService(exerciseRepository);
export const workoutService = new WorkoutService(workoutRepository, exerciseRepository, (id) =>
  identityStore.findById(id)
);
export const sessionService = new SessionService(
  sessionRepository,
  workoutRepository,
  exerciseLogRepository
);
export const exerciseLogService = new ExerciseLogService(
  exerciseLogRepository,
  exerciseRepository,
  sessionService
);
