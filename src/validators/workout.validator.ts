import { z } from "zod";
import { Difficulty } from "../common/common-enum";
import { idParamsSchema, listQueryValue, pageQuery } from "./common.validator";

// Range and uniqueness checks live in validatePrescriptions
const prescription = z.object({
  exerciseId: z.string().min(1, "exerciseId is required"),
  order: z.number(),
  targetSets: z.number().optional(),
  targetRepsMin: z.number().nullable().optional(),
  targetRepsMax: z.number().nullable().optional(),
  targetWeight: z.number().optional(),
  restSeconds: z.number().optional(),
  notes: z.string().optional(),
});

const workoutBody = z.object({
  name: z.string().min(1, "name is required").max(200, "name must be at most 200 characters"),
  description: z.string().optional(),
  difficulty: z.nativeEnum(Difficulty),
  exercises: z.array(prescription).optional(),
  tags: z.array(z.string()).optional(),
  isTemplate: z.boolean().optional(),
  isPublic: z.boolean().optional(),
  estimatedDurationMinutes: z.number().optional(),
  totalExercises: z.number().optional(),
});

export const createWorkoutSchema = { body: workoutBody };

export const updateWorkoutSchema = {
  params: idParamsSchema,
  body: workoutBody.partial(),
};

export const workoutIdSchema = { params: idParamsSchema };

export const listWorkoutsSchema = {
  query: z.object({
    ...pageQuery,
    difficulty: z.nativeEnum(Difficulty).optional(),
    tags: listQueryValue.optional(),
    search: z.string().optional(),
  }),
};
