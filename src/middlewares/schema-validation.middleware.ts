import { Request, Response, NextFunction } from "express";
import { ZodTypeAny } from "zod";
import { ErrorDetail, ValidationError } from "../common/errors";
import { toErrorDetails } from "../validators/common.validator";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

/**
 * Parses the request parts against their schemas. The parsed body replaces
 * `req.body`; the parsed query is kept on `res.locals.query` since Express
 * types `req.query` as raw query-string values.
 */
export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    const details: ErrorDetail[] = [];

    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (parsed.success) req.params = parsed.data;
      else details.push(...toErrorDetails(parsed.error, "params"));
    }

    if (schemas.query) {
      const parsed = schemas.query.safeParse(req.query);
      if (parsed.success) res.locals.query = parsed.data;
      else details.push(...toErrorDetails(parsed.error, "query"));
    }

    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body ?? {});
      if (parsed.success) req.body = parsed.data;
      else details.push(...toErrorDetails(parsed.error, "body"));
    }

    if (details.length > 0) {
      return next(new ValidationError(details.map((d) => d.message).join(", "), details));
    }
    return next();
  };
