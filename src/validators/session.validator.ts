import { z } from "zod";
import { SessionStatus } from "../common/common-enum";
import { dateValue, idParamsSchema, pageQuery } from "./common.validator";

export const createSessionSchema = {
  body: z.object({
    workoutId: z.string().min(1).nullable().optional(),
    scheduledDate: dateValue.nullable().optional(),
    notes: z.string().optional(),
  }),
};

export const completeSessionSchema = {
  params: idParamsSchema,
  body: z.object({
    rating: z.number().optional(),
    notes: z.string().optional(),
    caloriesBurned: z.number().optional(),
  }),
};

export const updateSessionSchema = {
  params: idParamsSchema,
  body: z
    .object({
      scheduledDate: dateValue.nullable().optional(),
      notes: z.string().optional(),
      rating: z.number().nullable().optional(),
      caloriesBurned: z.number().nullable().optional(),
    })
    .strict("status changes go through start, complete and cancel"),
};

export const sessionIdSchema = { params: idParamsSchema };

export const listSessionsSchema = {
  query: z.object({
    ...pageQuery,
    status: z.nativeEnum(SessionStatus).optional(),
    dateFrom: dateValue.optional(),
    dateTo: dateValue.optional(),
  }),
};
