import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { LogThreshold } from "../observability/types";
import { AppConfig, NamingMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "pdf-jpeg-archiver/1.0",
  ignoreHttpsErrors: false,
  fetchTimeoutMs: 30_000,
  renderTimeoutMs: 120_000,
  maxFetchAttempts: 3,
  maxConcurrency: 3,
  concurrencyCeiling: 5,
  defaultDpi: 150,
  maxDpi: 600,
  jpegQuality: 85,
  minBoundaryLength: 10,
  minPayloadFieldLength: 100,
  namingMode: "flat",
  includeSummary: true,
  workDir: os.tmpdir(),
  logLevel: "info",
};

const ENV_KEYS: Record<keyof AppConfig, string> = {
  userAgent: "USER_AGENT",
  ignoreHttpsErrors: "IGNORE_HTTPS_ERRORS",
  fetchTimeoutMs: "FETCH_TIMEOUT_MS",
  renderTimeoutMs: "RENDER_TIMEOUT_MS",
  maxFetchAttempts: "MAX_FETCH_ATTEMPTS",
  maxConcurrency: "MAX_CONCURRENCY",
  concurrencyCeiling: "CONCURRENCY_CEILING",
  defaultDpi: "DEFAULT_DPI",
  maxDpi: "MAX_DPI",
  jpegQuality: "JPEG_QUALITY",
  minBoundaryLength: "MIN_BOUNDARY_LENGTH",
  minPayloadFieldLength: "MIN_PAYLOAD_FIELD_LENGTH",
  namingMode: "NAMING_MODE",
  includeSummary: "INCLUDE_SUMMARY",
  workDir: "WORK_DIR",
  logLevel: "LOG_LEVEL",
};

function readConfigFile(configPath?: string): Record<string, unknown> {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toInt(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : fallback;
  }
  if (typeof value !== "string" || !value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string" || !value) {
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

function toText(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

function toNamingMode(value: unknown, fallback: NamingMode): NamingMode {
  return value === "flat" || value === "grouped" ? value : fallback;
}

function toLogThreshold(value: unknown, fallback: LogThreshold): LogThreshold {
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return fallback;
}

/** Overlays one source on `base`; values of the wrong shape keep the base value. */
function applyLayer(base: AppConfig, read: (key: keyof AppConfig) => unknown): AppConfig {
  return {
    userAgent: toText(read("userAgent"), base.userAgent),
    ignoreHttpsErrors: toBool(read("ignoreHttpsErrors"), base.ignoreHttpsErrors),
    fetchTimeoutMs: toInt(read("fetchTimeoutMs"), base.fetchTimeoutMs),
    renderTimeoutMs: toInt(read("renderTimeoutMs"), base.renderTimeoutMs),
    maxFetchAttempts: toInt(read("maxFetchAttempts"), base.maxFetchAttempts),
    maxConcurrency: toInt(read("maxConcurrency"), base.maxConcurrency),
    concurrencyCeiling: toInt(read("concurrencyCeiling"), base.concurrencyCeiling),
    defaultDpi: toInt(read("defaultDpi"), base.defaultDpi),
    maxDpi: toInt(read("maxDpi"), base.maxDpi),
    jpegQuality: toInt(read("jpegQuality"), base.jpegQuality),
    minBoundaryLength: toInt(read("minBoundaryLength"), base.minBoundaryLength),
    minPayloadFieldLength: toInt(read("minPayloadFieldLength"), base.minPayloadFieldLength),
    namingMode: toNamingMode(read("namingMode"), base.namingMode),
    includeSummary: toBool(read("includeSummary"), base.includeSummary),
    workDir: toText(read("workDir"), base.workDir),
    logLevel: toLogThreshold(read("logLevel"), base.logLevel),
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const fromFile = applyLayer(DEFAULT_CONFIG, (key) => fileConfig[key]);
  return applyLayer(fromFile, (key) => env[ENV_KEYS[key]]);
}

export { DEFAULT_CONFIG };
