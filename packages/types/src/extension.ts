import type { EntryDescriptor } from "./entry-point.js";
import { isEntryDescriptor } from "./entry-point.js";

/**
 * A loaded extension.
 *
 * `plugin` is what the entry point resolved to. `obj` holds the result of
 * invoking it when the manager was built with invoke-on-load, and is
 * `undefined` otherwise.
 */
export interface Extension<TPlugin = unknown, TObj = unknown> {
  readonly name: string;
  readonly entryPoint: EntryDescriptor | undefined;
  readonly plugin: TPlugin;
  readonly obj: TObj | undefined;
}

export type ExtensionPredicate = (extension: Extension) => boolean;

export function isExtension(value: unknown): value is Extension {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  if (!("name" in value) || typeof value.name !== "string") {
    return false;
  }

  if (!("plugin" in value) || !("obj" in value) || !("entryPoint" in value)) {
    return false;
  }

  return value.entryPoint === undefined || isEntryDescriptor(value.entryPoint);
}
