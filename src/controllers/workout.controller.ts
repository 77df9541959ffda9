import { NextFunction, Request, Response } from "express";
import { currentIdentity, optionalIdentity } from "../middlewares/auth.middleware";
import { workoutService } from "../services";
import {
  WorkoutFilters,
  WorkoutInput,
  WorkoutPatch,
} from "../types/request/workoutRequest";
import { sendSuccess } from "../utils/response";

const viewerOf = (res: Response) => optionalIdentity(res)?.id ?? null;

class WorkoutController {
  list = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const filters: WorkoutFilters = res.locals.query ?? {};
      const page = await workoutService.list(viewerOf(res), filters);
      sendSuccess(res, "Workouts retrieved", page);
    } catch (error) {
      next(error);
    }
  };

  get = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const workout = await workoutService.get(viewerOf(res), req.params.id);
      sendSuccess(res, "Workout retrieved", workout);
    } catch (error) {
      next(error);
    }
  };

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: WorkoutInput = req.body;
      const workout = await workoutService.create(currentIdentity(res).id, input);
      sendSuccess(res, "Workout created", workout, 201);
    } catch (error) {
      next(error);
    }
  };

  update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch: WorkoutPatch = req.body;
      const workout = await workoutService.update(currentIdentity(res).id, req.params.id, patch);
      sendSuccess(res, "Workout updated", workout);
    } catch (error) {
      next(error);
    }
  };

  clone = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const copy = await workoutService.clone(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout cloned", copy, 201);
    } catch (error) {
      next(error);
    }
  };

  delete = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await workoutService.delete(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout deleted");
    } catch (error) {
      next(error);
    }
  };
}

export default new WorkoutController();
