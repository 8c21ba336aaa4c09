import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: "https://kemono.su/api/v1",
  userAgent: "postgrab/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
  downloadsDir: "downloads",
  downloadConcurrency: 5,
  resolveConcurrency: 5,
  maxAttempts: 5,
  retryDelayMs: 0,
  logFile: "main.log",
  manifestsDir: "data/manifests",
  storePath: "data/history.sqlite",
};

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: positiveInt,
    downloadTimeoutMs: positiveInt,
    downloadsDir: z.string(),
    downloadConcurrency: positiveInt,
    resolveConcurrency: positiveInt,
    maxAttempts: positiveInt,
    retryDelayMs: z.number().int().nonnegative(),
    logFile: z.string(),
    manifestsDir: z.string(),
    storePath: z.string(),
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid config file ${absolutePath}: ${details}`);
  }
  return result.data;
}

function toInt(value: string | undefined, fallback: number, min = 1): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toOptionalPath(value: string | undefined, fallback: string | undefined): string | undefined {
  if (value === undefined) {
    return fallback;
  }
  return value.trim() === "" ? undefined : value;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return {
    ...merged,
    apiBaseUrl: env.API_BASE_URL ?? merged.apiBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    downloadsDir: env.DOWNLOADS_DIR ?? merged.downloadsDir,
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    resolveConcurrency: toInt(env.RESOLVE_CONCURRENCY, merged.resolveConcurrency),
    maxAttempts: toInt(env.MAX_ATTEMPTS, merged.maxAttempts),
    retryDelayMs: toInt(env.RETRY_DELAY_MS, merged.retryDelayMs, 0),
    logFile: toOptionalPath(env.LOG_FILE, merged.logFile),
    manifestsDir: env.MANIFESTS_DIR ?? merged.manifestsDir,
    storePath: env.STORE_PATH ?? merged.storePath,
  };
}

export { DEFAULT_CONFIG };
