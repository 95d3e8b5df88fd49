/**
 * Discovery-time handle for one registered extension.
 *
 * `resolve()` loads the underlying object (class, function or module) without
 * invoking it. Sources may defer all I/O to this call.
 */
export interface EntryDescriptor {
  readonly name: string;
  readonly namespace: string;
  /** Textual form, `<module>[:<export.path>]`, when the entry was declared as one. */
  readonly value?: string;
  /** Manifest file or package that declared the entry. */
  readonly origin?: string;
  resolve(): unknown;
}

export interface EntryPointSource {
  /** Entries registered under `namespace`, in discovery order. */
  listEntries(namespace: string): readonly EntryDescriptor[];
}

export function isEntryDescriptor(value: unknown): value is EntryDescriptor {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return (
    "name" in value &&
    typeof value.name === "string" &&
    "namespace" in value &&
    typeof value.namespace === "string" &&
    "resolve" in value &&
    typeof value.resolve === "function"
  );
}

export function isEntryPointSource(value: unknown): value is EntryPointSource {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return "listEntries" in value && typeof value.listEntries === "function";
}
