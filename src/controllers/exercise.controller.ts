import { NextFunction, Request, Response } from "express";
import {
  currentIdentity,
  optionalIdentity,
  toCaller,
} from "../middlewares/auth.middleware";
import { exerciseService } from "../services";
import {
  ExerciseFilters,
  ExerciseInput,
  ExercisePatch,
} from "../types/request/exerciseRequest";
import { sendSuccess } from "../utils/response";

const callerOf = (res: Response) => {
  const identity = optionalIdentity(res);
  return identity ? toCaller(identity) : null;
};

class ExerciseController {
  list = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const filters: ExerciseFilters = res.locals.query ?? {};
      const page = await exerciseService.list(callerOf(res), filters);
      sendSuccess(res, "Exercises retrieved", page);
    } catch (error) {
      next(error);
    }
  };

  get = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const exercise = await exerciseService.get(callerOf(res), req.params.id);
      sendSuccess(res, "Exercise retrieved", exercise);
    } catch (error) {
      next(error);
    }
  };

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: ExerciseInput = req.body;
      const exercise = await exerciseService.create(toCaller(currentIdentity(res)), input);
      sendSuccess(res, "Exercise created", exercise, 201);
    } catch (error) {
      next(error);
    }
  };

  update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch: ExercisePatch = req.body;
      const exercise = await exerciseService.update(
        toCaller(currentIdentity(res)),
        req.params.id,
        patch
      );
      sendSuccess(res, "Exercise updated", exercise);
    } catch (error) {
      next(error);
    }
  };

  delete = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await exerciseService.delete(toCaller(currentIdentity(res)), req.params.id);
      sendSuccess(res, "Exercise deleted");
    } catch (error) {
      next(error);
    }
  };
}

export default new ExerciseController();
