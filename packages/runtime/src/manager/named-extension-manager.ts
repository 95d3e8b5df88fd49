import type { Extension } from "@plugboard/types";
import {
  ExtensionManager,
  TEST_NAMESPACE,
  type ExtensionManagerOptions,
  type LoadHooks,
  type TestInstanceOptions,
} from "./extension-manager.js";

export interface NamedExtensionManagerOptions extends ExtensionManagerOptions {
  names: readonly string[];
  /** Order extensions as in `names` rather than discovery order. */
  nameOrder?: boolean;
  /** Called once with the requested names that did not end up loaded. */
  onMissingEntrypoints?: (missing: string[]) => void;
  warnOnMissingEntrypoint?: boolean;
}

export interface NamedTestInstanceOptions extends TestInstanceOptions {
  names: readonly string[];
  nameOrder?: boolean;
}

function namedHooks(names: readonly string[], nameOrder: boolean): LoadHooks {
  const wanted = new Set(names);

  return {
    select: (entry) => wanted.has(entry.name),
    arrange: (extensions) => {
      const kept = extensions.filter((extension) => wanted.has(extension.name));
      if (!nameOrder) {
        return kept;
      }

      const ordered: Extension[] = [];
      for (const name of names) {
        ordered.push(...kept.filter((extension) => extension.name === name));
      }
      return ordered;
    },
  };
}

/**
 * Loads only the extensions whose names are listed. Entries that were not
 * asked for are never resolved.
 */
export class NamedExtensionManager extends ExtensionManager {
  readonly requestedNames: readonly string[];
  readonly missingNames: readonly string[];

  constructor(options: NamedExtensionManagerOptions, preloaded?: readonly Extension[]) {
    const names = [...new Set(options.names)];
    super(options, namedHooks(names, options.nameOrder ?? false), preloaded);

    this.requestedNames = Object.freeze(names);
    const loaded = new Set(this.names());
    this.missingNames = Object.freeze(names.filter((name) => !loaded.has(name)));

    if (preloaded === undefined && this.missingNames.length > 0) {
      if (options.warnOnMissingEntrypoint ?? true) {
        this.logger?.warn?.(`could not find requested extensions: ${this.missingNames.join(", ")}`, {
          namespace: this.namespace,
        });
      }
      options.onMissingEntrypoints?.([...this.missingNames]);
    }
  }

  static override makeTestInstance(
    extensions: readonly Extension[],
    options: NamedTestInstanceOptions,
  ): NamedExtensionManager {
    return new NamedExtensionManager(
      {
        namespace: TEST_NAMESPACE,
        names: options.names,
        nameOrder: options.nameOrder,
        propagateMapExceptions: options.propagateMapExceptions,
        logger: options.logger,
      },
      extensions,
    );
  }
}
