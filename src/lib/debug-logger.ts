import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

import { isLevelEnabled, resolveRuntimeConfig, type LogLevel, type RuntimeConfig } from "./runtime-config";

const LOG_FILE_NAME = "screenflow.log";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: Record<string, unknown>;
}

let config: RuntimeConfig = resolveRuntimeConfig();
let initializedDir: string | null = null;

export function configureLogger(next: Partial<RuntimeConfig>): void {
  config = { ...config, ...next };
}

export function getLogFile(): string {
  return join(config.logDir, LOG_FILE_NAME);
}

async function ensureLogDir(dir: string): Promise<void> {
  if (initializedDir === dir) return;
  try {
    await mkdir(dir, { recursive: true });
    initializedDir = dir;
  } catch {
    // Logging must never take the installer down
  }
}

async function writeLog(entry: LogEntry): Promise<void> {
  await ensureLogDir(config.logDir);
  const line = JSON.stringify(entry) + "\n";
  try {
    await appendFile(getLogFile(), line, "utf8");
  } catch {
    // Silently fail
  }
}

function log(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!isLevelEnabled(level, config.logLevel)) return;
  void writeLog({ timestamp: new Date().toISOString(), level, scope, message, data });
}

function createScopedLogger(scope: string) {
  return {
    debug(message: string, data?: Record<string, unknown>) {
      log(scope, "debug", message, data);
    },
    info(message: string, data?: Record<string, unknown>) {
      log(scope, "info", message, data);
    },
    warn(message: string, data?: Record<string, unknown>) {
      log(scope, "warn", message, data);
    },
    error(message: string, data?: Record<string, unknown>) {
      log(scope, "error", message, data);
    },
  };
}

export type DebugLogger = ReturnType<typeof createScopedLogger>;

export const logger = {
  screens: createScopedLogger("screens"),
  workers: createScopedLogger("workers"),
  registry: createScopedLogger("registry"),
  flow: createScopedLogger("flow"),
  hub: createScopedLogger("hub"),
};

export { createScopedLogger };
