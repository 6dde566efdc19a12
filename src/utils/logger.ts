/**
 * Module-prefixed console logger.
 *
 * Text format: `2024-05-01T12:00:00.000Z [UDP Listener] [INFO] message {fields}`
 * with ANSI colours per level. JSON format: one object per line.
 *
 * Optionally mirrors every line (without colours) to a size-rotated log file:
 * relay.log is renamed to relay.log.1, relay.log.1 to relay.log.2 and so on,
 * keeping at most `backupCount` old files.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from "node:fs";
import { dirname } from "node:path";
import { config } from "../config.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured context appended to a log line */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m",  // cyan
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.logging.level];
}

/** Errors don't survive JSON.stringify; flatten them first */
function serializeFields(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value instanceof Error) {
      out[key] = value.message;
    } else if (value instanceof Date) {
      out[key] = value.toISOString();
    } else {
      out[key] = value;
    }
  }
  return out;
}

// ─────────────────────────────────────────────────────────────────────────────
// File output
// ─────────────────────────────────────────────────────────────────────────────

export interface LogFileOptions {
  /** Rotate before a line would push the file past this size */
  maxBytes?: number;
  /** Rotated files kept (relay.log.1 … relay.log.N); 0 truncates instead */
  backupCount?: number;
}

interface LogFile {
  path: string;
  maxBytes: number;
  backupCount: number;
  size: number;
}

let logFile: LogFile | null = null;

/**
 * Start mirroring log lines to `path`, creating its directory if needed.
 * Replaces any file opened before.
 */
export function openLogFile(path: string, options: LogFileOptions = {}): void {
  mkdirSync(dirname(path), { recursive: true });
  logFile = {
    path,
    maxBytes: options.maxBytes ?? config.logging.fileMaxBytes,
    backupCount: options.backupCount ?? config.logging.fileBackupCount,
    size: existsSync(path) ? statSync(path).size : 0,
  };
}

/** Stop writing to the log file (console output continues) */
export function closeLogFile(): void {
  logFile = null;
}

function rotate(file: LogFile): void {
  if (file.backupCount === 0) {
    rmSync(file.path, { force: true });
    return;
  }
  for (let index = file.backupCount - 1; index >= 1; index--) {
    const source = `${file.path}.${index}`;
    if (existsSync(source)) {
      renameSync(source, `${file.path}.${index + 1}`);
    }
  }
  renameSync(file.path, `${file.path}.1`);
}

function writeToFile(file: LogFile, line: string): void {
  const bytes = Buffer.byteLength(line) + 1;
  try {
    if (file.size > 0 && file.size + bytes > file.maxBytes) {
      rotate(file);
      file.size = 0;
    }
    appendFileSync(file.path, `${line}\n`);
    file.size += bytes;
  } catch (error) {
    // Don't retry on every line; fall back to console only
    logFile = null;
    console.error(`Log file ${file.path} disabled: ${error instanceof Error ? error.message : String(error)}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

function write(level: LogLevel, prefix: string, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return;

  const timestamp = new Date().toISOString();
  const stream = level === "error" || level === "warn" ? console.error : console.log;

  if (config.logging.format === "json") {
    const line = JSON.stringify({
      time: timestamp,
      level,
      module: prefix,
      msg: message,
      ...(fields ? serializeFields(fields) : {}),
    });
    stream(line);
    if (logFile) writeToFile(logFile, line);
    return;
  }

  const context = fields && Object.keys(fields).length > 0
    ? ` ${JSON.stringify(serializeFields(fields))}`
    : "";
  const head = `${timestamp} [${prefix}] [${level.toUpperCase()}]`;
  stream(`${LEVEL_COLORS[level]}${head}${RESET} ${message}${context}`);
  if (logFile) writeToFile(logFile, `${head} ${message}${context}`);
}

/**
 * Create a logger whose lines carry the given module prefix
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (message, fields) => write("debug", prefix, message, fields),
    info: (message, fields) => write("info", prefix, message, fields),
    warn: (message, fields) => write("warn", prefix, message, fields),
    error: (message, fields) => write("error", prefix, message, fields),
  };
}
