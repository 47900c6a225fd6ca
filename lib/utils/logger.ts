import fs from "fs";
import path from "path";

/* -------------------------------------------------------------------------- */
/*                              LOGGING UTILS                                 */
/* -------------------------------------------------------------------------- */

const LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function activeLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(activeLevel());
}

function formatData(data: unknown): string {
  return typeof data === "string" ? data : JSON.stringify(data, null, 2);
}

export type Logger = {
  step(step: string, data?: unknown): void;
  debug(step: string, data?: unknown): void;
  warn(step: string, data?: unknown): void;
  error(step: string, error: unknown, raw?: string): void;
};

export function createLogger(tag: string): Logger {
  return {
    step(step, data) {
      if (!enabled("info")) return;
      console.log(`\n🟦 [${tag}] ${step}`);
      if (data !== undefined) console.log(formatData(data));
    },

    debug(step, data) {
      if (!enabled("debug")) return;
      console.debug(`⬜ [${tag}] ${step}`);
      if (data !== undefined) console.debug(formatData(data));
    },

    warn(step, data) {
      if (!enabled("warn")) return;
      console.warn(`\n🟨 [${tag} WARN] ${step}`);
      if (data !== undefined) console.warn(formatData(data));
    },

    error(step, error, raw) {
      if (!enabled("error")) return;
      console.error(`\n🟥 [${tag} ERROR] ${step}`);
      console.error(error instanceof Error ? error.message : error);
      if (raw) {
        console.error("\n🔴 RAW LLM OUTPUT ↓↓↓");
        console.error(raw);
        console.error("🔴 END RAW LLM OUTPUT ↑↑↑\n");
      }
    },
  };
}

/**
 * ============================
 * Simple file logger
 * ============================
 *
 * One file per day under `logs/`, mirrored to the console.
 */
export function createFileLogger(name: string, logDir = path.join(process.cwd(), "logs")) {
  let logFile: string | undefined;

  return function log(message: string) {
    if (activeLevel() === "silent") return;

    if (!logFile) {
      fs.mkdirSync(logDir, { recursive: true });
      logFile = path.join(
        logDir,
        `${name}-${new Date().toISOString().split("T")[0]}.log`
      );
    }

    const line = `[${new Date().toISOString()}] ${message}\n`;
    fs.appendFileSync(logFile, line);
    if (enabled("info")) console.log(message);
  };
}
