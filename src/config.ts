/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DEFAULT_SOURCE_URL } from "./source/downloader.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { MemoryStorage } from "./storage/memory.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z
  .discriminatedUnion("provider", [
    z.object({
      provider: z.literal("disk"),
      basePath: z.string().min(1).default("data"),
    }),
    z.object({ provider: z.literal("memory") }),
  ])
  .default({ provider: "disk" });

const DbConfigSchema = z
  .discriminatedUnion("provider", [
    z.object({
      provider: z.literal("postgres"),
      host: z.string().min(1).default("localhost"),
      port: z.coerce.number().int().positive().default(5432),
      database: z.string().min(1).default("tec_data"),
      user: z.string().min(1).default("postgres"),
      password: z.string().default("password"),
    }),
    z.object({
      provider: z.literal("sqlite"),
      path: z.string().min(1).default("./tec_data.db"),
    }),
  ])
  .default({ provider: "postgres" });

const SourceConfigSchema = z
  .object({
    url: z.string().url().default(DEFAULT_SOURCE_URL),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  })
  .default({});

const PipelineConfigSchema = z
  .object({
    daysBack: z.coerce.number().int().min(0).default(2),
    intervalHours: z.coerce.number().positive().finite().default(6),
  })
  .default({});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema,
  db: DbConfigSchema,
  source: SourceConfigSchema,
  pipeline: PipelineConfigSchema,
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DbConfig = Config["db"];
export type StorageConfig = Config["storage"];

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Raw config from environment variables; defaults apply in parseConfig. */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const db =
    env.DB_PROVIDER === "sqlite"
      ? { provider: "sqlite", path: env.SQLITE_PATH }
      : {
          provider: env.DB_PROVIDER ?? "postgres",
          host: env.DB_HOST,
          port: env.DB_PORT,
          database: env.DB_NAME,
          user: env.DB_USER,
          password: env.DB_PASSWORD,
        };

  return {
    storage: { provider: "disk", basePath: env.DATA_DIR },
    db,
    source: { url: env.SOURCE_URL, timeoutMs: env.REQUEST_TIMEOUT_MS },
    pipeline: {
      daysBack: env.DAYS_BACK,
      intervalHours: env.SCHEDULE_INTERVAL_HOURS,
    },
    logLevel: env.LOG_LEVEL,
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function buildStorage(config: StorageConfig): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.basePath);
    case "memory":
      return new MemoryStorage();
  }
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "postgres":
      return new PostgresBackend({
        host: config.host,
        port: config.port,
        database: config.database,
        username: config.user,
        password: config.password,
      });
    case "sqlite":
      return new SQLiteBackend(config.path);
  }
}

export function validateConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): {
  config: Config;
  storage: StorageBackend;
  db: DatabaseBackend;
} {
  const config = validateConfig(raw);
  return { config, storage: buildStorage(config.storage), db: buildDb(config.db) };
}
