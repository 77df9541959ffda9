import { NextFunction, Request, Response } from "express";
import { currentIdentity } from "../middlewares/auth.middleware";
import { sessionService } from "../services";
import {
  SessionCompleteInput,
  SessionCreateInput,
  SessionFilters,
  SessionUpdateInput,
} from "../types/request/sessionRequest";
import { sendSuccess } from "../utils/response";

class SessionController {
  list = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const filters: SessionFilters = res.locals.query ?? {};
      const page = await sessionService.list(currentIdentity(res).id, filters);
      sendSuccess(res, "Workout sessions retrieved", page);
    } catch (error) {
      next(error);
    }
  };

  get = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await sessionService.get(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout session retrieved", session);
    } catch (error) {
      next(error);
    }
  };

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: SessionCreateInput = req.body;
      const session = await sessionService.create(currentIdentity(res).id, input);
      sendSuccess(res, "Workout session created", session, 201);
    } catch (error) {
      next(error);
    }
  };

  update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: SessionUpdateInput = req.body;
      const session = await sessionService.update(currentIdentity(res).id, req.params.id, input);
      sendSuccess(res, "Workout session updated", session);
    } catch (error) {
      next(error);
    }
  };

  start = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await sessionService.start(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout session started", session);
    } catch (error) {
      next(error);
    }
  };

  complete = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome: SessionCompleteInput = req.body;
      const session = await sessionService.complete(
        currentIdentity(res).id,
        req.params.id,
        outcome
      );
      sendSuccess(res, "Workout session completed", session);
    } catch (error) {
      next(error);
    }
  };

  cancel = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await sessionService.cancel(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout session cancelled", session);
    } catch (error) {
      next(error);
    }
  };

  delete = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await sessionService.delete(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Workout session deleted");
    } catch (error) {
      next(error);
    }
  };
}

export default new SessionController();
