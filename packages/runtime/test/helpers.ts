import { fileURLToPath } from "node:url";
import type { Extension } from "@plugboard/types";
import { createExtension, EntryPointRegistry, type LogLevel, type LogSink } from "../src/index.js";

export const FIXTURES_DIR = fileURLToPath(new URL("./fixtures/", import.meta.url));

export interface LogRecord {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface RecordingLogger extends Required<LogSink> {
  readonly records: LogRecord[];
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const records: LogRecord[] = [];
  const record = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    records.push(data === undefined ? { level, message } : { level, message, data });
  };

  return {
    records,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    messages(level) {
      return records.filter((entry) => entry.level === level).map((entry) => entry.message);
    },
  };
}

/**
 * Registry with one entry per name, each resolving to `plugins[name]`.
 */
export function createRegistry(namespace: string, plugins: Record<string, unknown>): EntryPointRegistry {
  const registry = new EntryPointRegistry();
  for (const [name, plugin] of Object.entries(plugins)) {
    registry.register(namespace, name, () => plugin);
  }
  return registry;
}

export function makeExtensions(names: readonly string[]): Extension[] {
  return names.map((name) => createExtension({ name, plugin: `${name}-plugin` }));
}
