import type { Extension, ExtensionPredicate } from "@plugboard/types";
import type { LogSink } from "../logging/logger.js";
import { ExtensionManager, TEST_NAMESPACE, type ExtensionManagerOptions, type TestInstanceOptions } from "./extension-manager.js";

export interface EnabledExtensionManagerOptions extends ExtensionManagerOptions {
  /** Returns true for extensions that should be kept. */
  checkFunc: ExtensionPredicate;
}

export interface EnabledTestInstanceOptions extends TestInstanceOptions {
  checkFunc: ExtensionPredicate;
}

function acceptWith(checkFunc: ExtensionPredicate, logger: LogSink | undefined): (extension: Extension) => boolean {
  return (extension) => {
    if (checkFunc(extension)) {
      return true;
    }
    logger?.debug?.(`ignoring extension "${extension.name}"`);
    return false;
  };
}

/**
 * Keeps only the extensions that pass `checkFunc`.
 *
 * The predicate sees the fully loaded extension, `obj` included. Errors it
 * throws are not treated as load failures and abort construction.
 */
export class EnabledExtensionManager extends ExtensionManager {
  readonly checkFunc: ExtensionPredicate;

  /**
   * @param preloaded - extensions to keep instead of running discovery; they
   *   are filtered by `checkFunc` like discovered ones.
   */
  constructor(options: EnabledExtensionManagerOptions, preloaded?: readonly Extension[]) {
    super(
      options,
      { accept: acceptWith(options.checkFunc, options.logger) },
      preloaded?.filter((extension) => options.checkFunc(extension)),
    );
    this.checkFunc = options.checkFunc;
  }

  /**
   * Test instance built from `extensions` instead of discovery, filtered by
   * `checkFunc` the same way loaded extensions are.
   */
  static override makeTestInstance(
    extensions: readonly Extension[],
    options: EnabledTestInstanceOptions,
  ): EnabledExtensionManager {
    return new EnabledExtensionManager(
      {
        namespace: TEST_NAMESPACE,
        checkFunc: options.checkFunc,
        propagateMapExceptions: options.propagateMapExceptions,
        logger: options.logger,
      },
      extensions,
    );
  }
}
