import { z } from "zod";
import { Difficulty, ExerciseCategory, MuscleGroup } from "../common/common-enum";
import { idParamsSchema, pageQuery } from "./common.validator";

const exerciseBody = z.object({
  name: z.string().min(1, "name is required").max(200, "name must be at most 200 characters"),
  description: z.string().optional(),
  category: z.nativeEnum(ExerciseCategory),
  difficulty: z.nativeEnum(Difficulty),
  primaryMuscles: z.array(z.nativeEnum(MuscleGroup)).optional(),
  secondaryMuscles: z.array(z.nativeEnum(MuscleGroup)).optional(),
  equipment: z.array(z.string()).optional(),
  instructions: z.array(z.string()).optional(),
  videoUrl: z.string().url("videoUrl must be a URL").or(z.literal("")).optional(),
  imageUrl: z.string().url("imageUrl must be a URL").or(z.literal("")).optional(),
  isPublic: z.boolean().optional(),
  isCustom: z.boolean().optional(),
});

export const createExerciseSchema = { body: exerciseBody };

export const updateExerciseSchema = {
  params: idParamsSchema,
  body: exerciseBody.omit({ isCustom: true }).partial(),
};

export const exerciseIdSchema = { params: idParamsSchema };

export const listExercisesSchema = {
  query: z.object({
    ...pageQuery,
    category: z.nativeEnum(ExerciseCategory).optional(),
    difficulty: z.nativeEnum(Difficulty).optional(),
    muscleGroup: z.nativeEnum(MuscleGroup).optional(),
    search: z.string().optional(),
  }),
};
