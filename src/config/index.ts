import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const ENVIRONMENTS = ["development", "test", "production"] as const;
const DATABASE_SCOPES = ["explicit", "env", "global", "local"] as const;

export const DATA_DIR_NAME = ".memvault";
export const DATABASE_FILENAME = "memory.db";

export const ConfigSchema = z.object({
  env: z.enum(ENVIRONMENTS),
  logLevel: z.enum(LOG_LEVELS),
  database: z.object({
    path: z.string().min(1),
    scope: z.enum(DATABASE_SCOPES),
  }),
  similar: z.object({
    limit: z.number().int().min(1).max(100),
    threshold: z.number(),
  }),
  dedupe: z.object({
    limit: z.number().int().min(1).max(100),
    threshold: z.number(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DatabaseScope = Config["database"]["scope"];
type ConfigInput = z.input<typeof ConfigSchema>;

export interface ConfigOverrides
  extends Partial<Omit<ConfigInput, "database" | "similar" | "dedupe">> {
  similar?: Partial<ConfigInput["similar"]>;
  dedupe?: Partial<ConfigInput["dedupe"]>;
}

export interface LoadConfigOptions {
  /**
   * Explicit .env file location. Pass `false` to skip dotenv entirely.
   */
  envFile?: string | false;
  /**
   * Additional environment variables to overlay (useful for tests).
   */
  envVars?: Record<string, string | undefined>;
  /**
   * Toggle dotenv loading. Defaults to `true`.
   */
  useDotenv?: boolean;
  /**
   * Directory probed for a local `.memvault/` folder. Defaults to `process.cwd()`.
   */
  cwd?: string;
  /**
   * Home directory hosting the global database. Defaults to `os.homedir()`.
   */
  homeDir?: string;
  /** Value of `--db`; wins over every other source. */
  dbPath?: string;
  /** Value of `--global`; skips local `.memvault/` detection. */
  useGlobal?: boolean;
}

export interface DatabaseLocation {
  path: string;
  scope: DatabaseScope;
}

export function globalDatabasePath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, DATA_DIR_NAME, DATABASE_FILENAME);
}

export function localDatabasePath(cwd: string = process.cwd()): string {
  return path.join(cwd, DATA_DIR_NAME, DATABASE_FILENAME);
}

export function expandHome(input: string, homeDir: string = os.homedir()): string {
  if (input === "~") {
    return homeDir;
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homeDir, input.slice(2));
  }
  return input;
}

/**
 * Resolves the database file. Priority: explicit path, `MEMVAULT_DB`,
 * `--global`, a `.memvault/` directory in `cwd`, then the global location.
 */
export function resolveDatabaseLocation(
  env: Record<string, string | undefined>,
  options: Pick<LoadConfigOptions, "cwd" | "homeDir" | "dbPath" | "useGlobal"> = {},
): DatabaseLocation {
  const { cwd = process.cwd(), homeDir = os.homedir(), dbPath, useGlobal = false } = options;

  if (dbPath) {
    return { path: path.resolve(cwd, expandHome(dbPath, homeDir)), scope: "explicit" };
  }

  const envPath = env.MEMVAULT_DB;
  if (envPath) {
    return { path: path.resolve(cwd, expandHome(envPath, homeDir)), scope: "env" };
  }

  if (useGlobal) {
    return { path: globalDatabasePath(homeDir), scope: "global" };
  }

  if (existsSync(path.join(cwd, DATA_DIR_NAME))) {
    return { path: localDatabasePath(cwd), scope: "local" };
  }

  return { path: globalDatabasePath(homeDir), scope: "global" };
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): Config {
  const {
    envFile,
    envVars = {},
    useDotenv = true,
    cwd: baseDir = process.cwd(),
  } = options;

  if (useDotenv) {
    const resolvedEnvPath =
      envFile === undefined
        ? path.resolve(baseDir, ".env")
        : envFile === false
          ? undefined
          : envFile;

    if (resolvedEnvPath && existsSync(resolvedEnvPath)) {
      loadEnvFile({ path: resolvedEnvPath });
    }
  }

  const mergedEnv: Record<string, string | undefined> = {
    ...process.env,
    ...envVars,
  };

  // Environment strings are narrowed by the schema below.
  const raw = {
    env: overrides.env ?? mergedEnv.NODE_ENV ?? "development",
    logLevel: overrides.logLevel ?? mergedEnv.LOG_LEVEL ?? "warn",
    database: resolveDatabaseLocation(mergedEnv, { ...options, cwd: baseDir }),
    similar: {
      limit:
        overrides.similar?.limit ??
        coerceInteger(mergedEnv.MEMVAULT_SIMILAR_LIMIT, 3),
      threshold:
        overrides.similar?.threshold ??
        coerceNumber(mergedEnv.MEMVAULT_SIMILAR_THRESHOLD, -5),
    },
    dedupe: {
      limit:
        overrides.dedupe?.limit ??
        coerceInteger(mergedEnv.MEMVAULT_DEDUPE_LIMIT, 10),
      threshold:
        overrides.dedupe?.threshold ??
        coerceNumber(mergedEnv.MEMVAULT_DEDUPE_THRESHOLD, -3),
    },
  };

  return Object.freeze(ConfigSchema.parse(raw));
}

function coerceInteger(value: string | undefined, fallback: number): number {
  if (typeof value === "string" && value.trim().length) {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

function coerceNumber(value: string | undefined, fallback: number): number {
  if (typeof value === "string" && value.trim().length) {
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}
