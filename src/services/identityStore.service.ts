import { Pool, QueryResultRow } from "pg";
import { v4 as uuidv4 } from "uuid";
import { IDENTITY_DB_CONFIG, IDENTITY_SETUP_SQL } from "../configs/database";
import { StoreUnavailable, ValidationError } from "../common/errors";
import { Identity, IdentityWithCredentials } from "../types/model/identity.model";
import { IdentityId } from "../types/model/reference.model";
import { STORE_NAMES } from "../utils/constants";
import { logger } from "../utils/logger";

export interface NewIdentity {
  username: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  isStaff?: boolean;
}

export type IdentityPatch = Partial<Pick<Identity, "email" | "firstName" | "lastName">>;

/**
 * The relational store of users and their credentials. Always authoritative
 * for identity; the document store only ever holds its ids.
 */
export interface IdentityStore {
  findById(id: IdentityId): Promise<Identity | null>;
  findByUsername(username: string): Promise<IdentityWithCredentials | null>;
  findCredentials(id: IdentityId): Promise<IdentityWithCredentials | null>;
  isUsernameTaken(username: string): Promise<boolean>;
  isEmailTaken(email: string, exceptId?: IdentityId): Promise<boolean>;
  create(identity: NewIdentity): Promise<Identity>;
  update(id: IdentityId, patch: IdentityPatch): Promise<Identity | null>;
  setPasswordHash(id: IdentityId, passwordHash: string): Promise<void>;
  /** Returns the identity's token, issuing one if it has none. */
  issueToken(id: IdentityId): Promise<string>;
  /** Replaces any existing token with a fresh one. */
  rotateToken(id: IdentityId): Promise<string>;
  revokeToken(id: IdentityId): Promise<void>;
  resolveCaller(token: string): Promise<Identity | null>;
}

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  is_staff: boolean;
  created_at: Date;
};

const USER_COLUMNS = `u.id, u.username, u.email, u.password_hash, u.first_name,
  u.last_name, u.is_staff, u.created_at`;

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

const UNIQUE_VIOLATION = "23505";

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

const toIdentity = (row: UserRow): Identity => ({
  id: row.id,
  username: row.username,
  email: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  isStaff: row.is_staff,
  createdAt: row.created_at,
});

const toCredentials = (row: UserRow): IdentityWithCredentials => ({
  ...toIdentity(row),
  passwordHash: row.password_hash,
});

const newTokenKey = () => uuidv4().replace(/-/g, "");

export class PgIdentityStore implements IdentityStore {
  private pool: Pool;

  constructor(pool?: Pool) {
    this.pool = pool ?? new Pool(IDENTITY_DB_CONFIG);
  }

  async initialize(): Promise<void> {
    await this.query(IDENTITY_SETUP_SQL);
    logger.info("Identity tables ready");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async findById(id: IdentityId): Promise<Identity | null> {
    const rows = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [id]
    );
    return rows[0] ? toIdentity(rows[0]) : null;
  }

  async findByUsername(username: string): Promise<IdentityWithCredentials | null> {
    const rows = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.username = $1`,
      [username]
    );
    return rows[0] ? toCredentials(rows[0]) : null;
  }

  async findCredentials(id: IdentityId): Promise<IdentityWithCredentials | null> {
    const rows = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [id]
    );
    return rows[0] ? toCredentials(rows[0]) : null;
  }

  async isUsernameTaken(username: string): Promise<boolean> {
    const rows = await this.query<{ exists: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM users WHERE username = $1) AS exists`,
      [username]
    );
    return rows[0]?.exists ?? false;
  }

  async isEmailTaken(email: string, exceptId?: IdentityId): Promise<boolean> {
    const rows = await this.query<{ exists: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM users WHERE lower(email) = lower($1) AND id <> $2
       ) AS exists`,
      [email, exceptId ?? 0]
    );
    return rows[0]?.exists ?? false;
  }

  async create(identity: NewIdentity): Promise<Identity> {
    try {
      const rows = await this.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, first_name, last_name, is_staff)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id, username, email, password_hash, first_name, last_name, is_staff, created_at`,
        [
          identity.username,
          identity.email,
          identity.passwordHash,
          identity.firstName,
          identity.lastName,
          identity.isStaff ?? false,
        ]
      );
      return toIdentity(rows[0]);
    } catch (error) {
      if (errorCode(error) === UNIQUE_VIOLATION) {
        throw new ValidationError("Username or email already exists");
      }
      throw error;
    }
  }

  async update(id: IdentityId, patch: IdentityPatch): Promise<Identity | null> {
    const rows = await this.query<UserRow>(
      `UPDATE users u SET
         email = COALESCE($2, u.email),
         first_name = COALESCE($3, u.first_name),
         last_name = COALESCE($4, u.last_name)
       WHERE u.id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, patch.email ?? null, patch.firstName ?? null, patch.lastName ?? null]
    );
    return rows[0] ? toIdentity(rows[0]) : null;
  }

  async setPasswordHash(id: IdentityId, passwordHash: string): Promise<void> {
    await this.query(`UPDATE users SET password_hash = $2 WHERE id = $1`, [id, passwordHash]);
  }

  async issueToken(id: IdentityId): Promise<string> {
    const rows = await this.query<{ key: string }>(
      `INSERT INTO auth_tokens (key, user_id) VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE SET user_id = EXCLUDED.user_id
       RETURNING key`,
      [newTokenKey(), id]
    );
    return rows[0].key;
  }

  async rotateToken(id: IdentityId): Promise<string> {
    const rows = await this.query<{ key: string }>(
      `INSERT INTO auth_tokens (key, user_id) VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE SET key = EXCLUDED.key, created_at = NOW()
       RETURNING key`,
      [newTokenKey(), id]
    );
    return rows[0].key;
  }

  async revokeToken(id: IdentityId): Promise<void> {
    await this.query(`DELETE FROM auth_tokens WHERE user_id = $1`, [id]);
  }

  async resolveCaller(token: string): Promise<Identity | null> {
    const rows = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM auth_tokens t
       JOIN users u ON u.id = t.user_id
       WHERE t.key = $1`,
      [token]
    );
    return rows[0] ? toIdentity(rows[0]) : null;
  }

  private async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = []
  ): Promise<R[]> {
    try {
      const result = await this.pool.query<R>(text, params);
      return result.rows;
    } catch (error) {
      const code = errorCode(error);
      if (code && CONNECTION_ERROR_CODES.has(code)) {
        throw new StoreUnavailable(STORE_NAMES.IDENTITY, error);
      }
      if (error instanceof Error && /timeout/i.test(error.message)) {
        throw new StoreUnavailable(STORE_NAMES.IDENTITY, error);
      }
      throw error;
    }
  }
}
