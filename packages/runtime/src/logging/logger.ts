/**
 * Log sinks used by the managers, and a console logger to hand them.
 *
 * Managers only require a {@link LogSink}; any `Console` satisfies it.
 */
import { Chalk, type ChalkInstance } from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/**
 * Minimal logging surface accepted by the managers. Every method is optional
 * so a partial sink (or none at all) is valid.
 */
export interface LogSink {
  debug?(message: string, data?: Record<string, unknown>): void;
  info?(message: string, data?: Record<string, unknown>): void;
  warn?(message: string, data?: Record<string, unknown>): void;
  error?(message: string, data?: Record<string, unknown>): void;
}

export interface Logger extends Required<LogSink> {
  readonly level: LogLevel;
}

export type LogStream = "stdout" | "stderr";

export interface LoggerOptions {
  /** Lowest level written (default "info") */
  level?: LogLevel;
  /** Output JSON lines instead of text */
  json?: boolean;
  /** Colorize text output (default true) */
  color?: boolean;
  /** Line writer; defaults to process.stdout / process.stderr */
  write?: (stream: LogStream, line: string) => void;
  /** Clock used for JSON timestamps */
  now?: () => Date;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

function writeProcess(stream: LogStream, line: string): void {
  if (stream === "stderr") {
    process.stderr.write(line + "\n");
    return;
  }
  process.stdout.write(line + "\n");
}

function formatTextMessage(c: ChalkInstance, level: LogLevel, message: string): string {
  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const threshold = LOG_LEVELS.indexOf(level);
  const write = options.write ?? writeProcess;
  const now = options.now ?? (() => new Date());
  const c = new Chalk({ level: options.color === false ? 0 : 1 });

  const output = (entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) {
      return;
    }

    const stream: LogStream = entryLevel === "error" || entryLevel === "warn" ? "stderr" : "stdout";

    if (options.json) {
      const entry: JsonLogEntry = {
        level: entryLevel,
        message,
        timestamp: now().toISOString(),
      };
      if (data) {
        entry.data = data;
      }
      write(stream, JSON.stringify(entry));
      return;
    }

    write(stream, formatTextMessage(c, entryLevel, message));
    if (data && entryLevel === "debug") {
      write(stream, c.gray(JSON.stringify(data, null, 2)));
    }
  };

  return {
    level,
    debug(message, data) {
      output("debug", message, data);
    },
    info(message, data) {
      output("info", message, data);
    },
    warn(message, data) {
      output("warn", message, data);
    },
    error(message, data) {
      output("error", message, data);
    },
  };
}
