import { Request, Response, NextFunction } from "express";
import { ValidationError, isDomainError } from "../common/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

// express.json() rejects malformed bodies with a SyntaxError carrying this type
const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";

export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const error = isBodyParseError(err)
    ? new ValidationError("Malformed JSON body")
    : err;

  if (isDomainError(error)) {
    const where = `${req.method} ${req.originalUrl}`;
    if (error.status >= 500) {
      logger.error(`${where} failed: ${error.message}`);
    } else {
      logger.warn(`${where} rejected: ${error.kind} ${error.message}`);
    }
    const details = error instanceof ValidationError && error.details.length > 0
      ? error.details
      : undefined;
    return sendError(res, error.message, error.status, error.kind, details);
  }

  logger.error("Unhandled error", err);
  return sendError(res, "Internal Server Error", 500, "InternalError");
}
