import { ProfilePatch } from "../model/profile.model";

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
  passwordConfirm: string;
  firstName?: string;
  lastName?: string;
  profile?: ProfilePatch;
}

export interface LoginInput {
  username: string;
  password: string;
}

export interface AccountUpdateInput {
  email?: string;
  firstName?: string;
  lastName?: string;
  profile?: ProfilePatch;
}

export interface ChangePasswordInput {
  oldPassword: string;
  newPassword: string;
  newPasswordConfirm: string;
}
