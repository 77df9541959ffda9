import { ConnectOptions } from "mongoose";
import { PoolConfig } from "pg";
import { loadConfig } from "./environment";

const config = loadConfig();

export const IDENTITY_DB_CONFIG: PoolConfig = {
  host: config.identityDb.host,
  port: config.identityDb.port,
  database: config.identityDb.name,
  user: config.identityDb.user,
  password: config.identityDb.password,
  ssl: config.identityDb.ssl ? { rejectUnauthorized: true } : false,
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: config.identityDb.connectionTimeoutMs,
};

export const PROFILE_DB_URI = config.profileDb.uri;

// Unreachable Mongo must fail fast instead of queueing commands.
export const PROFILE_DB_OPTIONS: ConnectOptions = {
  serverSelectionTimeoutMS: config.profileDb.timeoutMs,
  connectTimeoutMS: config.profileDb.timeoutMs,
  socketTimeoutMS: config.profileDb.timeoutMs * 5,
  bufferCommands: false,
  autoIndex: true,
};

// Retry schedule when the profile store is down at startup
export const PROFILE_DB_RECONNECT = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

// Identity schema setup script
export const IDENTITY_SETUP_SQL = `
CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    username VARCHAR(150) NOT NULL UNIQUE,
    email VARCHAR(254) NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    first_name VARCHAR(150) NOT NULL DEFAULT '',
    last_name VARCHAR(150) NOT NULL DEFAULT '',
    is_staff BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS auth_tokens (
    key VARCHAR(64) PRIMARY KEY,
    user_id INTEGER NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_users_email ON users(email);

CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
    NEW.updated_at = NOW();
    RETURN NEW;
END;
$$ language 'plpgsql';

DROP TRIGGER IF EXISTS update_users_updated_at ON users;
CREATE TRIGGER update_users_updated_at
    BEFORE UPDATE ON users
    FOR EACH ROW
    EXECUTE FUNCTION update_updated_at_column();
`;
