import { Request, Response, NextFunction } from "express";
import { AuthenticationError } from "../common/errors";
import { authService } from "../services";
import { AuthService } from "../services/auth.service";
import { Caller, Identity } from "../types/model/identity.model";

const AUTH_HEADER = /^(?:Token|Bearer)\s+(\S+)$/i;

export const extractToken = (header: string | undefined): string | null => {
  const match = header ? AUTH_HEADER.exec(header.trim()) : null;
  return match ? match[1] : null;
};

/**
 * Resolves `Authorization: Token <key>` (or `Bearer <key>`) into
 * `res.locals.identity`. With `required`, a missing or unknown token is a 401.
 */
export const createAuthMiddleware = (auth: Pick<AuthService, "authenticate">) => {
  const resolve =
    (required: boolean) => async (req: Request, res: Response, next: NextFunction) => {
      try {
        const token = extractToken(req.headers.authorization);
        const identity = token ? await auth.authenticate(token) : null;
        if (token && !identity) {
          throw new AuthenticationError("Invalid token");
        }
        if (required && !identity) {
          throw new AuthenticationError("Authentication credentials were not provided");
        }
        res.locals.identity = identity;
        next();
      } catch (error) {
        next(error);
      }
    };

  return { requireAuth: resolve(true), optionalAuth: resolve(false) };
};

export const { requireAuth, optionalAuth } = createAuthMiddleware(authService);

export const currentIdentity = (res: Response): Identity => {
  const identity: Identity | null | undefined = res.locals.identity;
  if (!identity) {
    throw new AuthenticationError("Authentication credentials were not provided");
  }
  return identity;
};

export const optionalIdentity = (res: Response): Identity | null => {
  const identity: Identity | null | undefined = res.locals.identity;
  return identity ?? null;
};

export const toCaller = (identity: Identity): Caller => ({
  id: identity.id,
  isStaff: identity.isStaff,
});
