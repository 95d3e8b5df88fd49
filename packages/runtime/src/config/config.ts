/**
 * Project configuration
 *
 * Loads `.plugboardrc` (YAML) from the project and merges environment
 * overrides on top of it.
 */
import { existsSync, promises as fs } from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import type { EntryPointSource } from "@plugboard/types";
import { isPlainObject, isStringArray } from "@plugboard/types";
import { ConfigError, toErrorMessage } from "../errors.js";
import { ManifestEntryPointSource } from "../discovery/manifest-source.js";
import { PackageEntryPointSource } from "../discovery/package-source.js";
import { CompositeEntryPointSource } from "../discovery/registry.js";
import type { ExtensionManagerOptions } from "../manager/extension-manager.js";
import { createLogger, isLogLevel, type LogLevel, type Logger, type LoggerOptions } from "../logging/logger.js";

export interface PlugboardConfig {
  /** Lowest level logged */
  logLevel?: LogLevel;
  /** Enable color output */
  color?: boolean;
  /** YAML manifests declaring entry points (absolute after loading) */
  manifests?: string[];
  /** Directories scanned like node_modules for package entry points (absolute after loading) */
  packageDirs?: string[];
  /** Default map policy for managers built from this config */
  propagateMapExceptions?: boolean;
}

export const DEFAULT_CONFIG: Readonly<PlugboardConfig> = {
  logLevel: "info",
  color: true,
  manifests: [],
  packageDirs: [],
  propagateMapExceptions: false,
};

export const CONFIG_FILE_NAME = ".plugboardrc";

/**
 * Searches from `startDir` upward for `.plugboardrc`
 */
export function findProjectConfigPath(startDir: string = process.cwd()): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

function resolvePaths(paths: string[], baseDir: string): string[] {
  return paths.map((entry) => path.resolve(baseDir, entry));
}

/**
 * Validates a parsed config document. Relative paths resolve against `baseDir`.
 */
export function parseConfig(value: unknown, baseDir: string, filePath?: string): PlugboardConfig {
  if (value === null || value === undefined) {
    return {};
  }

  if (!isPlainObject(value)) {
    throw new ConfigError("config root must be a mapping", filePath);
  }

  const config: PlugboardConfig = {};

  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) {
      throw new ConfigError(`invalid logLevel: ${String(value.logLevel)}`, filePath);
    }
    config.logLevel = value.logLevel;
  }

  if (value.color !== undefined) {
    if (typeof value.color !== "boolean") {
      throw new ConfigError("color must be a boolean", filePath);
    }
    config.color = value.color;
  }

  if (value.propagateMapExceptions !== undefined) {
    if (typeof value.propagateMapExceptions !== "boolean") {
      throw new ConfigError("propagateMapExceptions must be a boolean", filePath);
    }
    config.propagateMapExceptions = value.propagateMapExceptions;
  }

  if (value.manifests !== undefined) {
    if (!isStringArray(value.manifests)) {
      throw new ConfigError("manifests must be a list of paths", filePath);
    }
    config.manifests = resolvePaths(value.manifests, baseDir);
  }

  if (value.packageDirs !== undefined) {
    if (!isStringArray(value.packageDirs)) {
      throw new ConfigError("packageDirs must be a list of paths", filePath);
    }
    config.packageDirs = resolvePaths(value.packageDirs, baseDir);
  }

  return config;
}

/**
 * Load a single config file, undefined when it does not exist
 */
export async function loadConfigFile(filePath: string): Promise<PlugboardConfig | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw new ConfigError(`cannot read config: ${toErrorMessage(error)}`, filePath);
  }

  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${toErrorMessage(error)}`, filePath);
  }

  return parseConfig(document, path.dirname(filePath), filePath);
}

/**
 * Merge multiple configs with priority (later configs override earlier)
 */
export function mergeConfigs(...configs: (PlugboardConfig | undefined)[]): PlugboardConfig {
  const result: PlugboardConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }

    if (config.logLevel !== undefined) result.logLevel = config.logLevel;
    if (config.color !== undefined) result.color = config.color;
    if (config.manifests !== undefined) result.manifests = [...config.manifests];
    if (config.packageDirs !== undefined) result.packageDirs = [...config.packageDirs];
    if (config.propagateMapExceptions !== undefined) {
      result.propagateMapExceptions = config.propagateMapExceptions;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Directory the upward search starts from and env paths resolve against */
  cwd?: string;
  env?: {
    PLUGBOARD_LOG_LEVEL?: string;
    PLUGBOARD_MANIFESTS?: string;
    PLUGBOARD_PACKAGE_DIRS?: string;
    NO_COLOR?: string;
  };
}

function splitPathList(value: string, cwd: string): string[] {
  return resolvePaths(
    value.split(path.delimiter).filter((entry) => entry.length > 0),
    cwd,
  );
}

/**
 * Priority (highest to lowest):
 * 1. Environment variables
 * 2. Project config (.plugboardrc)
 * 3. Defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PlugboardConfig> {
  const cwd = options.cwd ?? process.cwd();
  const projectConfigPath = options.configPath ? path.resolve(cwd, options.configPath) : findProjectConfigPath(cwd);
  const projectConfig = projectConfigPath ? await loadConfigFile(projectConfigPath) : undefined;

  const env = options.env ?? process.env;
  const envConfig: PlugboardConfig = {};

  if (env.PLUGBOARD_LOG_LEVEL) {
    const level = env.PLUGBOARD_LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      envConfig.logLevel = level;
    }
  }
  if (env.PLUGBOARD_MANIFESTS) {
    envConfig.manifests = splitPathList(env.PLUGBOARD_MANIFESTS, cwd);
  }
  if (env.PLUGBOARD_PACKAGE_DIRS) {
    envConfig.packageDirs = splitPathList(env.PLUGBOARD_PACKAGE_DIRS, cwd);
  }
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  return mergeConfigs(DEFAULT_CONFIG, projectConfig, envConfig);
}

/**
 * Manifest entries first, then package entries.
 */
export async function createSourceFromConfig(config: PlugboardConfig): Promise<EntryPointSource> {
  const manifests = await ManifestEntryPointSource.fromFiles(config.manifests ?? []);
  const packages = await PackageEntryPointSource.scan(config.packageDirs ?? []);
  return new CompositeEntryPointSource([manifests, packages]);
}

export function createLoggerFromConfig(
  config: PlugboardConfig,
  options: Pick<LoggerOptions, "json" | "write" | "now"> = {},
): Logger {
  return createLogger({
    ...options,
    level: config.logLevel,
    color: config.color,
  });
}

export type ManagerContext = Required<Pick<ExtensionManagerOptions, "source" | "logger" | "propagateMapExceptions">>;

/**
 * Source, logger and map policy to spread into manager options:
 * `new ExtensionManager({ ...context, namespace })`.
 */
export async function createManagerContext(
  config: PlugboardConfig,
  loggerOptions: Pick<LoggerOptions, "json" | "write" | "now"> = {},
): Promise<ManagerContext> {
  return {
    source: await createSourceFromConfig(config),
    logger: createLoggerFromConfig(config, loggerOptions),
    propagateMapExceptions: config.propagateMapExceptions ?? false,
  };
}
