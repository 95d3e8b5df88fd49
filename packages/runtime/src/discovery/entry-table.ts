import { isPlainObject } from "@plugboard/types";

export interface DeclaredEntry {
  namespace: string;
  name: string;
  spec: string;
}

function toOrderedPairs(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) {
    return [...value.entries()];
  }
  if (isPlainObject(value)) {
    return Object.entries(value);
  }
  return undefined;
}

/**
 * Flattens an `entryPoints` table of the form
 * `{ <namespace>: { <name>: "<module>[:<export.path>]" } }`, preserving order.
 * Maps (from YAML parsed with `mapAsMap`) and plain objects are both accepted.
 *
 * Returns a list of problems instead of throwing so callers can attach the
 * file they were reading.
 */
export function readEntryPointTable(value: unknown): { entries: DeclaredEntry[]; errors: string[] } {
  const entries: DeclaredEntry[] = [];
  const errors: string[] = [];

  const namespaces = toOrderedPairs(value);
  if (namespaces === undefined) {
    errors.push("entryPoints must be a mapping of namespace to entries");
    return { entries, errors };
  }

  for (const [namespace, table] of namespaces) {
    if (typeof namespace !== "string" || namespace.length === 0) {
      errors.push(`invalid namespace key: ${String(namespace)}`);
      continue;
    }

    const pairs = toOrderedPairs(table);
    if (pairs === undefined) {
      errors.push(`entryPoints.${namespace} must be a mapping of name to module spec`);
      continue;
    }

    for (const [name, spec] of pairs) {
      if (typeof name !== "string" || name.length === 0) {
        errors.push(`entryPoints.${namespace} has an invalid name: ${String(name)}`);
        continue;
      }
      if (typeof spec !== "string") {
        errors.push(`entryPoints.${namespace}.${name} must be a string`);
        continue;
      }
      entries.push({ namespace, name, spec });
    }
  }

  return { entries, errors };
}
