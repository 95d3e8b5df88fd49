import { createRequire } from "node:module";
import * as path from "node:path";
import type { EntryDescriptor } from "@plugboard/types";
import { EntryPointSpecError } from "../errors.js";

export interface EntryPointSpec {
  module: string;
  /** Property path walked from the module's exports; empty means the module itself. */
  exportPath: string[];
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Parses `<module>[:<export.path>]`.
 *
 * The last colon splits module from export path only when everything after it
 * is a dotted identifier path, so `C:\plugins\a.cjs` stays a module.
 */
export function parseEntryPointSpec(spec: string): EntryPointSpec {
  const trimmed = spec.trim();
  if (trimmed.length === 0) {
    throw new EntryPointSpecError("entry point spec is empty", spec);
  }

  const separator = trimmed.lastIndexOf(":");
  if (separator === -1) {
    return { module: trimmed, exportPath: [] };
  }

  const modulePart = trimmed.slice(0, separator).trim();
  const exportPart = trimmed.slice(separator + 1).trim();
  const segments = exportPart.split(".");

  if (exportPart.length === 0) {
    throw new EntryPointSpecError(`entry point spec has an empty export path: ${spec}`, spec);
  }

  if (!segments.every((segment) => IDENTIFIER.test(segment))) {
    if (exportPart.includes("\\") || exportPart.includes("/")) {
      return { module: trimmed, exportPath: [] };
    }
    throw new EntryPointSpecError(`invalid export path "${exportPart}" in entry point spec: ${spec}`, spec);
  }

  if (modulePart.length === 0) {
    throw new EntryPointSpecError(`entry point spec has no module: ${spec}`, spec);
  }

  return { module: modulePart, exportPath: segments };
}

export function formatEntryPointSpec(spec: EntryPointSpec): string {
  return spec.exportPath.length > 0 ? `${spec.module}:${spec.exportPath.join(".")}` : spec.module;
}

function readMember(target: unknown, key: string): unknown {
  if ((typeof target !== "object" || target === null) && typeof target !== "function") {
    throw new TypeError(`cannot read "${key}" from a ${target === null ? "null" : typeof target} value`);
  }

  if (!(key in target)) {
    throw new TypeError(`module has no export "${key}"`);
  }

  const member: unknown = Reflect.get(target, key);
  return member;
}

/**
 * Loads a module synchronously, relative specifiers resolved against `baseDir`.
 * ES modules are not loadable this way on Node 20; publish plugins as CommonJS.
 */
export function loadEntryPointTarget(spec: EntryPointSpec, baseDir: string): unknown {
  const requireFrom = createRequire(path.join(baseDir, "noop.js"));
  let target: unknown = requireFrom(spec.module);

  for (const key of spec.exportPath) {
    target = readMember(target, key);
  }

  return target;
}

export interface ModuleEntryOptions {
  namespace: string;
  name: string;
  spec: string;
  baseDir: string;
  origin?: string;
}

/**
 * Descriptor whose `resolve()` loads `<module>:<export.path>`.
 * The spec is parsed eagerly so malformed declarations fail at discovery time.
 */
export function createModuleEntry(options: ModuleEntryOptions): EntryDescriptor {
  const parsed = parseEntryPointSpec(options.spec);

  return Object.freeze({
    name: options.name,
    namespace: options.namespace,
    value: formatEntryPointSpec(parsed),
    origin: options.origin,
    resolve(): unknown {
      return loadEntryPointTarget(parsed, options.baseDir);
    },
  });
}
