import { ExperienceLevel, FitnessGoal } from "../common/common-enum";
import { StoreUnavailable } from "../common/errors";
import { Degraded, Result, degraded, ok } from "../common/result";
import { ProfileRepository } from "../repositories/types";
import { Profile, ProfileFields, ProfilePatch } from "../types/model/profile.model";
import { IdentityId } from "../types/model/reference.model";
import { STORE_NAMES } from "../utils/constants";
import { logger } from "../utils/logger";
import { uniqueStrings } from "../utils/text";

export type ProfileResult = Result<Profile, Degraded>;

export const DEFAULT_PROFILE: ProfileFields = {
  bio: "",
  height: null,
  weight: null,
  dateOfBirth: null,
  fitnessGoal: FitnessGoal.GENERAL,
  experienceLevel: ExperienceLevel.BEGINNER,
  preferredWorkoutTypes: [],
};

const log = logger.child("ProfileStore");

/**
 * Reads and writes the document-store profile of an identity.
 *
 * The only component allowed to absorb a store outage: when the document
 * store is unreachable it answers with a Degraded result so that login,
 * registration and "who am I" can still complete from identity data alone.
 * Any other failure propagates.
 */
export class ProfileStoreService {
  constructor(private readonly profiles: ProfileRepository) {}

  /**
   * Returns the stored profile unmodified when one exists, otherwise creates
   * it from `defaults`.
   */
  async getOrCreate(
    identityId: IdentityId,
    defaults: Partial<ProfileFields> = {}
  ): Promise<ProfileResult> {
    return this.degradeOnOutage("getOrCreate", identityId, async () => {
      const existing = await this.profiles.findByIdentity(identityId);
      if (existing) return existing;

      const created = await this.profiles.createIfAbsent(identityId, {
        ...DEFAULT_PROFILE,
        ...defaults,
        preferredWorkoutTypes: uniqueStrings(defaults.preferredWorkoutTypes),
      });
      log.info(`Created profile for identity ${identityId}`);
      return created;
    });
  }

  async update(identityId: IdentityId, patch: ProfilePatch): Promise<ProfileResult> {
    return this.degradeOnOutage("update", identityId, async () => {
      const current = await this.getOrCreateStrict(identityId);
      const normalized: ProfilePatch = { ...patch };
      if (patch.preferredWorkoutTypes) {
        normalized.preferredWorkoutTypes = uniqueStrings(patch.preferredWorkoutTypes);
      }
      if (Object.keys(normalized).length === 0) return current;

      const updated = await this.profiles.update(identityId, normalized);
      return updated ?? current;
    });
  }

  private async getOrCreateStrict(identityId: IdentityId): Promise<Profile> {
    const existing = await this.profiles.findByIdentity(identityId);
    return existing ?? this.profiles.createIfAbsent(identityId, { ...DEFAULT_PROFILE });
  }

  private async degradeOnOutage(
    operation: string,
    identityId: IdentityId,
    run: () => Promise<Profile>
  ): Promise<ProfileResult> {
    try {
      return ok(await run());
    } catch (error) {
      if (error instanceof StoreUnavailable) {
        log.warn(`${operation} degraded for identity ${identityId}: ${error.message}`);
        return degraded(STORE_NAMES.PROFILE, error.message);
      }
      throw error;
    }
  }
}
