import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import { ExerciseLog } from "../types/model/exerciseLog.model";
import { WorkoutExercisePrescription } from "../types/model/workout.model";
import { WorkoutSession } from "../types/model/workoutSession.model";
import { WORKOUT_CONSTANTS } from "./constants";

dayjs.extend(utc);

const MS_PER_MINUTE = 60_000;

export class WorkoutCalculator {
  constructor(
    private readonly assumedSetSeconds: number = WORKOUT_CONSTANTS.ASSUMED_SET_DURATION_SECONDS
  ) {}

  /**
   * Heuristic template length: every set costs its rest period plus an
   * assumed working time. Not measured time.
   */
  public estimateDurationMinutes(
    prescriptions: readonly Pick<WorkoutExercisePrescription, "targetSets" | "restSeconds">[]
  ): number {
    const totalSeconds = prescriptions.reduce(
      (sum, item) => sum + item.targetSets * (item.restSeconds + this.assumedSetSeconds),
      0
    );
    return Math.round(totalSeconds / 60);
  }

  public elapsedMinutes(start: Date, end: Date): number {
    return Math.round((end.getTime() - start.getTime()) / MS_PER_MINUTE);
  }

  /** Sum of reps × weight; a log missing either factor contributes 0. */
  public totalVolume(logs: readonly Pick<ExerciseLog, "reps" | "weight">[]): number {
    return logs.reduce((sum, log) => sum + (log.reps ?? 0) * (log.weight ?? 0), 0);
  }

  /** First of end time, start time, creation time that is set. */
  public sessionMoment(
    session: Pick<WorkoutSession, "endTime" | "startTime" | "createdAt">
  ): Date {
    return session.endTime ?? session.startTime ?? session.createdAt;
  }

  public sessionDate(
    session: Pick<WorkoutSession, "endTime" | "startTime" | "createdAt">
  ): string {
    return dayjs.utc(this.sessionMoment(session)).format("YYYY-MM-DD");
  }
}

export const startOfUtcDay = (date: Date): Date => dayjs.utc(date).startOf("day").toDate();

export const endOfUtcDay = (date: Date): Date => dayjs.utc(date).endOf("day").toDate();

export const workoutCalculator = new WorkoutCalculator();
