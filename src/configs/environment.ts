import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = z.string().regex(/^\d+$/, "must be a non-negative integer");

const envSchema = z.object({
  PORT: numeric.optional(),
  NODE_ENV: z.string().optional(),

  IDENTITY_DB_HOST: z.string().optional(),
  IDENTITY_DB_PORT: numeric.optional(),
  IDENTITY_DB_NAME: z.string().optional(),
  IDENTITY_DB_USER: z.string().optional(),
  IDENTITY_DB_PASSWORD: z.string().optional(),
  IDENTITY_DB_SSL: z.enum(["true", "false"]).optional(),

  PROFILE_DB_URI: z.string().optional(),
  PROFILE_DB_TIMEOUT_MS: numeric.optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  RATE_LIMIT_WINDOW: numeric.optional(),
  RATE_LIMIT_MAX: numeric.optional(),
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    identityDb: {
      host: env.IDENTITY_DB_HOST || "localhost",
      port: parseInt(env.IDENTITY_DB_PORT || "5432", 10),
      name: env.IDENTITY_DB_NAME || "fitness",
      user: env.IDENTITY_DB_USER || "postgres",
      password: env.IDENTITY_DB_PASSWORD || "postgres",
      ssl: env.IDENTITY_DB_SSL === "true",
      connectionTimeoutMs: 2000,
    },
    profileDb: {
      uri: env.PROFILE_DB_URI || "mongodb://localhost:27017/fitness",
      timeoutMs: parseInt(env.PROFILE_DB_TIMEOUT_MS || "3000", 10),
    },
    logging: {
      level: env.LOG_LEVEL || "info",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = () => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
};
