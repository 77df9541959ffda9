import { ExperienceLevel, FitnessGoal } from "../../common/common-enum";
import { IdentityId } from "./reference.model";

export interface Profile {
  identityId: IdentityId;
  bio: string;
  height: number | null; // cm
  weight: number | null; // kg
  dateOfBirth: string | null; // YYYY-MM-DD
  fitnessGoal: FitnessGoal;
  experienceLevel: ExperienceLevel;
  preferredWorkoutTypes: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type ProfileFields = Omit<Profile, "identityId" | "createdAt" | "updatedAt">;

export type ProfilePatch = Partial<ProfileFields>;
