import { ZodError, z } from "zod";
import { ErrorDetail } from "../common/errors";

export const idParamsSchema = z.object({
  id: z.string().min(1, "id is required"),
});

export const pageQuery = {
  page: z.coerce.number().int().min(1, "page must be >= 1").optional(),
  pageSize: z.coerce.number().int().min(1, "pageSize must be >= 1").optional(),
};

/** `YYYY-MM-DD` or a full ISO timestamp. */
export const dateValue = z.coerce.date({
  errorMap: () => ({ message: "must be a valid date" }),
});

/** `?tags=a,b` or repeated `?tags=a&tags=b`. */
export const listQueryValue = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(",")));

export const toErrorDetails = (error: ZodError, source?: string): ErrorDetail[] =>
  error.errors.map((issue) => ({
    path: (source ? [source, ...issue.path] : issue.path).join("."),
    message: issue.message,
  }));
