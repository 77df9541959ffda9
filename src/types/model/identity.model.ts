import { IdentityId, WeakReference } from "./reference.model";

export interface Identity {
  id: IdentityId;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isStaff: boolean;
  createdAt: Date;
}

export interface IdentityWithCredentials extends Identity {
  passwordHash: string;
}

/** Cross-store pointer to an identity; resolves to null once the user is gone. */
export type IdentityReference = WeakReference<Identity, IdentityId>;

export type IdentityLookup = (id: IdentityId) => Promise<Identity | null>;

/** The authenticated principal a request acts as. */
export interface Caller {
  id: IdentityId;
  isStaff: boolean;
}
