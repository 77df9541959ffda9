import mongoose, { Schema, Types } from "mongoose";
import { ExperienceLevel, FitnessGoal } from "../../common/common-enum";
import { Profile } from "../../types/model/profile.model";

export type ProfileDoc = Profile;
export type LeanProfile = ProfileDoc & { _id: Types.ObjectId };

const ProfileSchema = new Schema<ProfileDoc>(
  {
    // Weak reference to users.id in the identity store, never enforced
    identityId: { type: Number, required: true, unique: true, index: true },
    bio: { type: String, default: "" },
    height: { type: Number, default: null, min: 0 },
    weight: { type: Number, default: null, min: 0 },
    dateOfBirth: { type: String, default: null },
    fitnessGoal: {
      type: String,
      enum: Object.values(FitnessGoal),
      default: FitnessGoal.GENERAL,
    },
    experienceLevel: {
      type: String,
      enum: Object.values(ExperienceLevel),
      default: ExperienceLevel.BEGINNER,
    },
    preferredWorkoutTypes: { type: [String], default: [] },
  },
  { timestamps: true, collection: "profiles" }
);

export const ProfileModel = mongoose.model<ProfileDoc>("Profile", ProfileSchema);
