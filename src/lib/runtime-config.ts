/**
 * Runtime configuration resolved from the environment.
 *
 * Logs default to ~/.screenflow/logs. Tests set SCREENFLOW_LOG_LEVEL=off so
 * nothing is written outside the workspace.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "off";

export interface RuntimeConfig {
  logDir: string;
  logLevel: LogThreshold;
  /** Warn when joining a cancelled check worker takes longer than this. */
  joinWarnMs: number;
}

const DEFAULT_LOG_DIR = join(homedir(), ".screenflow", "logs");
const DEFAULT_LOG_LEVEL: LogThreshold = "info";
const DEFAULT_JOIN_WARN_MS = 5_000;

const LOG_THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "off"];

function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some((threshold) => threshold === value);
}

function parseLogLevel(raw: string | undefined): LogThreshold {
  if (!raw) return DEFAULT_LOG_LEVEL;
  const normalized = raw.trim().toLowerCase();
  return isLogThreshold(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const logDir = env.SCREENFLOW_LOG_DIR?.trim();
  return {
    logDir: logDir && logDir.length > 0 ? logDir : DEFAULT_LOG_DIR,
    logLevel: parseLogLevel(env.SCREENFLOW_LOG_LEVEL),
    joinWarnMs: parsePositiveInt(env.SCREENFLOW_JOIN_WARN_MS, DEFAULT_JOIN_WARN_MS),
  };
}

/**
 * Whether a message at `level` passes the configured threshold.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogThreshold): boolean {
  if (threshold === "off") return false;
  return LOG_THRESHOLDS.indexOf(level) >= LOG_THRESHOLDS.indexOf(threshold);
}

export { DEFAULT_LOG_DIR, DEFAULT_JOIN_WARN_MS };
