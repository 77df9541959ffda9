import { z } from "zod";
import { LOG_CONSTANTS } from "../utils/constants";
import { dateValue, idParamsSchema, pageQuery } from "./common.validator";

// Metric presence and ranges are checked by the log service
const measurements = {
  setNumber: z.number().optional(),
  reps: z.number().nullable().optional(),
  weight: z.number().nullable().optional(),
  durationSeconds: z.number().nullable().optional(),
  distance: z.number().nullable().optional(),
  perceivedExertion: z.number().nullable().optional(),
  notes: z.string().optional(),
  completedAt: dateValue.optional(),
};

const logItem = z.object({
  exerciseId: z.string().min(1, "exerciseId is required"),
  ...measurements,
});

export const createLogSchema = {
  body: logItem.extend({
    sessionId: z.string().min(1, "sessionId is required"),
  }),
};

export const bulkLogSchema = {
  body: z.object({
    sessionId: z.string().min(1, "sessionId is required"),
    logs: z
      .array(z.unknown())
      .min(1, "logs must contain at least one item")
      .max(
        LOG_CONSTANTS.MAX_BULK_ITEMS,
        `logs must contain at most ${LOG_CONSTANTS.MAX_BULK_ITEMS} items`
      ),
  }),
};

/** Items are parsed one by one so a malformed item fails on its own. */
export const bulkLogItemSchema = logItem;

export const updateLogSchema = {
  params: idParamsSchema,
  body: z.object(measurements),
};

export const logIdSchema = { params: idParamsSchema };

export const listLogsSchema = {
  query: z.object({
    ...pageQuery,
    sessionId: z.string().optional(),
    exerciseId: z.string().optional(),
  }),
};
