import { z } from "zod";
import { ExperienceLevel, FitnessGoal } from "../common/common-enum";

const profilePatch = z
  .object({
    bio: z.string().max(500, "bio must be at most 500 characters"),
    height: z.number().positive("height must be positive").nullable(),
    weight: z.number().positive("weight must be positive").nullable(),
    dateOfBirth: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, "dateOfBirth must be YYYY-MM-DD")
      .nullable(),
    fitnessGoal: z.nativeEnum(FitnessGoal),
    experienceLevel: z.nativeEnum(ExperienceLevel),
    preferredWorkoutTypes: z.array(z.string()),
  })
  .partial();

export const registerSchema = {
  body: z.object({
    username: z.string().min(1, "username is required"),
    email: z.string().min(1, "email is required"),
    password: z.string().min(1, "password is required"),
    passwordConfirm: z.string().min(1, "passwordConfirm is required"),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    profile: profilePatch.optional(),
  }),
};

export const loginSchema = {
  body: z.object({
    username: z.string().min(1, "username is required"),
    password: z.string().min(1, "password is required"),
  }),
};

export const updateAccountSchema = {
  body: z.object({
    email: z.string().optional(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    profile: profilePatch.optional(),
  }),
};

export const changePasswordSchema = {
  body: z.object({
    oldPassword: z.string().min(1, "oldPassword is required"),
    newPassword: z.string().min(1, "newPassword is required"),
    newPasswordConfirm: z.string().min(1, "newPasswordConfirm is required"),
  }),
};
