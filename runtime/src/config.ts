import { config } from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { MAX_STEP_TIMEOUT_SECONDS, stepTimeoutSchema } from "./schema.js";

export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = String(env.CONDUCTOR_HOME || "").trim();
  return fromEnv || join(homedir(), ".conductor");
}

/**
 * Load environment variables from ~/.conductor/.env.
 * Loads once per process.
 */
let envLoaded = false;
export function ensureEnvLoaded(): void {
  if (envLoaded) return;
  config({ path: join(defaultDataDir(), ".env") });
  envLoaded = true;
}

const fileConfigSchema = z
  .object({
    dataDir: z.string().min(1),
    eventDbPath: z.string().min(1),
    artifactDir: z.string().min(1),
    defaultStepTimeoutSeconds: stepTimeoutSchema,
    workerThreads: z.number().int().positive(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
    retry: z
      .object({
        enabled: z.boolean(),
        delayMs: z.number().int().nonnegative(),
      })
      .partial(),
    gateway: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
      })
      .partial(),
  })
  .partial();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ConductorConfig {
  dataDir: string;
  eventDbPath: string;
  artifactDir: string;
  defaultStepTimeoutSeconds: number;
  workerThreads: number;
  logLevel: LogLevel;
  retry: { enabled: boolean; delayMs: number };
  gateway: { host: string; port: number };
}

/**
 * Read `config.json` from the data directory. Missing file → empty config;
 * unreadable or invalid file → ConfigError.
 */
export function loadConfigFile(configPath: string): FileConfig {
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Defaults, then config.json, then environment variables.
 */
export function loadConductorConfig(env: NodeJS.ProcessEnv = process.env): ConductorConfig {
  const dataDir = defaultDataDir(env);
  const file = loadConfigFile(join(dataDir, "config.json"));
  const baseDir = file.dataDir ?? dataDir;

  return {
    dataDir: baseDir,
    eventDbPath: nonEmpty(env.CONDUCTOR_EVENT_DB) ?? file.eventDbPath ?? join(baseDir, "events.db"),
    artifactDir:
      nonEmpty(env.CONDUCTOR_ARTIFACT_DIR) ?? file.artifactDir ?? join(baseDir, "artifacts"),
    defaultStepTimeoutSeconds:
      parseTimeoutSeconds(env.CONDUCTOR_STEP_TIMEOUT_SEC) ?? file.defaultStepTimeoutSeconds ?? 300,
    workerThreads: parsePositiveInt(env.CONDUCTOR_WORKER_THREADS) ?? file.workerThreads ?? 4,
    logLevel: parseLogLevel(env.CONDUCTOR_LOG_LEVEL) ?? file.logLevel ?? "info",
    retry: {
      enabled: parseOptionalBool(env.CONDUCTOR_RETRY_ENABLED) ?? file.retry?.enabled ?? false,
      delayMs: parseNonNegativeInt(env.CONDUCTOR_RETRY_DELAY_MS) ?? file.retry?.delayMs ?? 1000,
    },
    gateway: {
      host: nonEmpty(env.HOST) ?? file.gateway?.host ?? "127.0.0.1",
      port: parseNonNegativeInt(env.PORT) ?? file.gateway?.port ?? 8080,
    },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = String(value || "").trim();
  return trimmed || undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseTimeoutSeconds(value: string | undefined): number | undefined {
  const parsed = Number.parseFloat(value || "");
  return Number.isFinite(parsed) && parsed > 0 && parsed <= MAX_STEP_TIMEOUT_SECONDS
    ? parsed
    : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = String(value || "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function parseOptionalBool(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
  }
  return undefined;
}
