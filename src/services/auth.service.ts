import {
  AuthenticationError,
  ErrorDetail,
  NotFoundError,
  ValidationError,
} from "../common/errors";
import { Identity } from "../types/model/identity.model";
import { Profile } from "../types/model/profile.model";
import { IdentityId } from "../types/model/reference.model";
import {
  AccountUpdateInput,
  ChangePasswordInput,
  LoginInput,
  RegisterInput,
} from "../types/request/authRequest";
import { logger } from "../utils/logger";
import { hashPassword, verifyPassword } from "../utils/password";
import { IdentityStore } from "./identityStore.service";
import { ProfileResult, ProfileStoreService } from "./profileStore.service";

const log = logger.child("Auth");

const MIN_PASSWORD_LENGTH = 8;
const USERNAME_PATTERN = /^[\w.@+-]{3,150}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const PROFILE_UNAVAILABLE_WARNING =
  "Profile data is temporarily unavailable; showing account details only";

/** Identity data plus the profile, or a warning when the profile store is down. */
export interface AccountView {
  user: Identity;
  profile: Profile | null;
  warning?: string;
}

export interface AuthSession extends AccountView {
  token: string;
}

const toAccountView = (user: Identity, result: ProfileResult): AccountView =>
  result.ok
    ? { user, profile: result.value }
    : { user, profile: null, warning: PROFILE_UNAVAILABLE_WARNING };

function checkNewPassword(password: string, confirmation: string, path: string): ErrorDetail[] {
  const issues: ErrorDetail[] = [];
  if (password.length < MIN_PASSWORD_LENGTH) {
    issues.push({ path, message: `must be at least ${MIN_PASSWORD_LENGTH} characters` });
  }
  if (password !== confirmation) {
    issues.push({ path: `${path}Confirm`, message: "passwords do not match" });
  }
  return issues;
}

const throwIfAny = (message: string, issues: ErrorDetail[]) => {
  if (issues.length > 0) throw new ValidationError(message, issues);
};

/**
 * Token authentication on top of the identity store. Profile reads and
 * writes go through ProfileStoreService, so every flow here still
 * completes when the document store is unreachable.
 */
export class AuthService {
  constructor(
    private readonly identities: IdentityStore,
    private readonly profiles: ProfileStoreService
  ) {}

  async register(input: RegisterInput): Promise<AuthSession> {
    const username = input.username.trim();
    const email = input.email.trim();

    const issues: ErrorDetail[] = [];
    if (!USERNAME_PATTERN.test(username)) {
      issues.push({ path: "username", message: "3-150 letters, digits or @.+-_" });
    }
    if (!EMAIL_PATTERN.test(email)) {
      issues.push({ path: "email", message: "must be a valid email address" });
    }
    issues.push(...checkNewPassword(input.password, input.passwordConfirm, "password"));
    throwIfAny("Invalid registration data", issues);

    if (await this.identities.isUsernameTaken(username)) {
      throw new ValidationError("A user with that username already exists", [
        { path: "username", message: "already taken" },
      ]);
    }
    if (await this.identities.isEmailTaken(email)) {
      throw new ValidationError("A user with that email already exists", [
        { path: "email", message: "already taken" },
      ]);
    }

    const user = await this.identities.create({
      username,
      email,
      passwordHash: await hashPassword(input.password),
      firstName: input.firstName?.trim() ?? "",
      lastName: input.lastName?.trim() ?? "",
    });
    const token = await this.identities.issueToken(user.id);
    const profile = await this.profiles.getOrCreate(user.id, input.profile ?? {});

    log.info(`Registered identity ${user.id} (${user.username})`);
    return { ...toAccountView(user, profile), token };
  }

  async login(input: LoginInput): Promise<AuthSession> {
    const found = await this.identities.findByUsername(input.username.trim());
    if (!found || !(await verifyPassword(input.password, found.passwordHash))) {
      throw new AuthenticationError("Invalid username or password");
    }

    const { passwordHash: _hash, ...user } = found;
    const token = await this.identities.issueToken(user.id);
    const profile = await this.profiles.getOrCreate(user.id);
    return { ...toAccountView(user, profile), token };
  }

  async logout(identityId: IdentityId): Promise<void> {
    await this.identities.revokeToken(identityId);
  }

  /** Resolves a bearer token to its identity; null when unknown. */
  async authenticate(token: string): Promise<Identity | null> {
    if (token.length === 0) return null;
    return this.identities.resolveCaller(token);
  }

  async me(user: Identity): Promise<AccountView> {
    return toAccountView(user, await this.profiles.getOrCreate(user.id));
  }

  async updateAccount(user: Identity, input: AccountUpdateInput): Promise<AccountView> {
    const email = input.email?.trim();
    if (email !== undefined) {
      if (!EMAIL_PATTERN.test(email)) {
        throw new ValidationError("Invalid account data", [
          { path: "email", message: "must be a valid email address" },
        ]);
      }
      if (await this.identities.isEmailTaken(email, user.id)) {
        throw new ValidationError("A user with that email already exists", [
          { path: "email", message: "already taken" },
        ]);
      }
    }

    const updated =
      email !== undefined || input.firstName !== undefined || input.lastName !== undefined
        ? await this.identities.update(user.id, {
            email,
            firstName: input.firstName?.trim(),
            lastName: input.lastName?.trim(),
          })
        : user;
    if (!updated) throw new NotFoundError("User not found");

    const profile = input.profile
      ? await this.profiles.update(user.id, input.profile)
      : await this.profiles.getOrCreate(user.id);
    return toAccountView(updated, profile);
  }

  /** Rotates the token, so other clients holding the old one are signed out. */
  async changePassword(identityId: IdentityId, input: ChangePasswordInput): Promise<string> {
    const found = await this.identities.findCredentials(identityId);
    if (!found) throw new NotFoundError("User not found");

    if (!(await verifyPassword(input.oldPassword, found.passwordHash))) {
      throw new ValidationError("Old password is incorrect", [
        { path: "oldPassword", message: "incorrect" },
      ]);
    }
    throwIfAny(
      "Invalid new password",
      checkNewPassword(input.newPassword, input.newPasswordConfirm, "newPassword")
    );

    await this.identities.setPasswordHash(identityId, await hashPassword(input.newPassword));
    log.info(`Password changed for identity ${identityId}`);
    return this.identities.rotateToken(identityId);
  }
}
