import { appendFileSync } from "node:fs";
import { stdout } from "node:process";

export type Level = "info" | "warn" | "error" | "debug";

const LEVEL_ORDER: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLevel(value: string | undefined): value is Level {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let minLevelValue = isLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
let logFilePath: string | undefined = process.env.LOG_FILE || undefined;

export function setLogLevel(level: Level) {
  minLevelValue = LEVEL_ORDER[level];
}

/** Mirror every emitted line into `path` (append-only). Pass undefined to detach. */
export function setLogFile(path: string | undefined) {
  logFilePath = path;
}

export function log(level: Level, message: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] > minLevelValue) {
    return;
  }
  const payload = {
    level,
    message,
    time: new Date().toISOString(),
    ...meta,
  };
  const line = `${JSON.stringify(payload)}\n`;
  stdout.write(line);
  if (logFilePath) {
    try {
      appendFileSync(logFilePath, line, "utf8");
    } catch (error) {
      logFilePath = undefined;
      stdout.write(
        `${JSON.stringify({
          level: "warn",
          message: "Log file disabled after write failure",
          time: new Date().toISOString(),
          error: error instanceof Error ? error.message : String(error),
        })}\n`
      );
    }
  }
}

export const logger = {
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
};
