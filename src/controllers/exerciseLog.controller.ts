import { NextFunction, Request, Response } from "express";
import { ValidationError } from "../common/errors";
import { currentIdentity, toCaller } from "../middlewares/auth.middleware";
import { exerciseLogService } from "../services";
import {
  BulkLogItem,
  ExerciseLogFilters,
  ExerciseLogInput,
  ExerciseLogPatch,
} from "../types/request/exerciseLogRequest";
import { sendSuccess } from "../utils/response";
import { bulkLogItemSchema } from "../validators/exerciseLog.validator";
import { toErrorDetails } from "../validators/common.validator";

const parseBulkItem = (raw: unknown): BulkLogItem => {
  const parsed = bulkLogItemSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const details = toErrorDetails(parsed.error);
  return new ValidationError(details.map((d) => d.message).join(", "), details);
};

class ExerciseLogController {
  list = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const filters: ExerciseLogFilters = res.locals.query ?? {};
      const page = await exerciseLogService.list(toCaller(currentIdentity(res)), filters);
      sendSuccess(res, "Exercise logs retrieved", page);
    } catch (error) {
      next(error);
    }
  };

  get = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const log = await exerciseLogService.get(toCaller(currentIdentity(res)), req.params.id);
      sendSuccess(res, "Exercise log retrieved", log);
    } catch (error) {
      next(error);
    }
  };

  create = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId, ...input }: ExerciseLogInput & { sessionId: string } = req.body;
      const log = await exerciseLogService.createOne(currentIdentity(res).id, sessionId, input);
      sendSuccess(res, "Exercise log created", log, 201);
    } catch (error) {
      next(error);
    }
  };

  createBulk = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId, logs }: { sessionId: string; logs: unknown[] } = req.body;
      const result = await exerciseLogService.createBulk(
        currentIdentity(res).id,
        sessionId,
        logs.map(parseBulkItem)
      );
      sendSuccess(res, `${result.created} logs created, ${result.failed} failed`, result, 201);
    } catch (error) {
      next(error);
    }
  };

  update = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch: ExerciseLogPatch = req.body;
      const log = await exerciseLogService.update(currentIdentity(res).id, req.params.id, patch);
      sendSuccess(res, "Exercise log updated", log);
    } catch (error) {
      next(error);
    }
  };

  delete = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await exerciseLogService.delete(currentIdentity(res).id, req.params.id);
      sendSuccess(res, "Exercise log deleted");
    } catch (error) {
      next(error);
    }
  };
}

export default new ExerciseLogController();
