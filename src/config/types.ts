import { LogThreshold } from "../observability/types";

export type NamingMode = "flat" | "grouped";

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  fetchTimeoutMs: number;
  renderTimeoutMs: number;
  maxFetchAttempts: number;
  maxConcurrency: number;
  concurrencyCeiling: number;
  defaultDpi: number;
  maxDpi: number;
  jpegQuality: number;
  minBoundaryLength: number;
  minPayloadFieldLength: number;
  namingMode: NamingMode;
  includeSummary: boolean;
  workDir: string;
  logLevel: LogThreshold;
}

