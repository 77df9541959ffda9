import { LeanProfile, ProfileModel } from "../database/schemas/profile.schema";
import { Profile, ProfileFields, ProfilePatch } from "../types/model/profile.model";
import { IdentityId } from "../types/model/reference.model";
import { STORE_NAMES } from "../utils/constants";
import { isDuplicateKeyError, withStore } from "./storeGuard";
import { ProfileRepository } from "./types";

const toProfile = (doc: LeanProfile): Profile => ({
  identityId: doc.identityId,
  bio: doc.bio,
  height: doc.height,
  weight: doc.weight,
  dateOfBirth: doc.dateOfBirth,
  fitnessGoal: doc.fitnessGoal,
  experienceLevel: doc.experienceLevel,
  preferredWorkoutTypes: [...doc.preferredWorkoutTypes],
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoProfileRepository implements ProfileRepository {
  async findByIdentity(identityId: IdentityId): Promise<Profile | null> {
    return withStore(STORE_NAMES.PROFILE, async () => {
      const doc = await ProfileModel.findOne({ identityId }).lean<LeanProfile>();
      return doc ? toProfile(doc) : null;
    });
  }

  async createIfAbsent(identityId: IdentityId, fields: ProfileFields): Promise<Profile> {
    return withStore(STORE_NAMES.PROFILE, async () => {
      let doc: LeanProfile | null;
      try {
        // $setOnInsert leaves an existing profile untouched
        doc = await ProfileModel.findOneAndUpdate(
          { identityId },
          { $setOnInsert: { identityId, ...fields } },
          { upsert: true, new: true, setDefaultsOnInsert: true }
        ).lean<LeanProfile>();
      } catch (error) {
        // A concurrent upsert won the insert
        if (!isDuplicateKeyError(error)) throw error;
        doc = await ProfileModel.findOne({ identityId }).lean<LeanProfile>();
      }
      if (!doc) {
        throw new Error(`Profile upsert for identity ${identityId} returned nothing`);
      }
      return toProfile(doc);
    });
  }

  async update(identityId: IdentityId, patch: ProfilePatch): Promise<Profile | null> {
    return withStore(STORE_NAMES.PROFILE, async () => {
      const doc = await ProfileModel.findOneAndUpdate(
        { identityId },
        { $set: patch },
        { new: true, runValidators: true }
      ).lean<LeanProfile>();
      return doc ? toProfile(doc) : null;
    });
  }
}
