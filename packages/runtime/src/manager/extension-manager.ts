import type { EntryDescriptor, EntryPointSource, Extension } from "@plugboard/types";
import { ExtensionLoadError, ExtensionNotFoundError, toErrorMessage } from "../errors.js";
import { defaultRegistry } from "../discovery/registry.js";
import type { LogSink } from "../logging/logger.js";
import { createExtension, invokePlugin } from "./extension.js";

export const TEST_NAMESPACE = "TESTING";

export type LoadFailureCallback = (entry: EntryDescriptor, error: ExtensionLoadError) => void;

export interface ExtensionManagerOptions {
  namespace: string;
  /** Call (or construct) each plugin right after it is loaded and keep the result as `obj`. */
  invokeOnLoad?: boolean;
  invokeArgs?: readonly unknown[];
  /** Passed as one trailing object argument when non-empty. */
  invokeKwds?: Readonly<Record<string, unknown>>;
  /** Rethrow the first error raised inside `map` instead of logging it and moving on. */
  propagateMapExceptions?: boolean;
  source?: EntryPointSource;
  logger?: LogSink;
  /** Runs after a load failure is logged. Throwing from it aborts construction. */
  onLoadFailure?: LoadFailureCallback;
}

/**
 * Steps a manager variant plugs into loading. `select` and `accept` apply to
 * discovery only; `arrange` also runs for test instances.
 */
export interface LoadHooks {
  select?: (entry: EntryDescriptor) => boolean;
  accept?: (extension: Extension) => boolean;
  arrange?: (extensions: readonly Extension[]) => Extension[];
}

export interface TestInstanceOptions {
  propagateMapExceptions?: boolean;
  logger?: LogSink;
}

export type MapFunction<TResult, TArgs extends unknown[]> = (extension: Extension, ...args: TArgs) => TResult;

/**
 * Loads every extension registered under a namespace and runs operations
 * over the ones that loaded.
 *
 * The extension list is fixed when the constructor returns.
 */
export class ExtensionManager implements Iterable<Extension> {
  readonly namespace: string;
  readonly propagateMapExceptions: boolean;
  readonly invokeOnLoad: boolean;
  readonly invokeArgs: readonly unknown[];
  readonly invokeKwds: Readonly<Record<string, unknown>>;
  readonly extensions: readonly Extension[];

  protected readonly logger?: LogSink;
  private readonly entryPoints: readonly EntryDescriptor[];
  private readonly onLoadFailure?: LoadFailureCallback;

  /**
   * @param preloaded - extensions to store instead of running discovery; this
   *   is the test-instance path behind `makeTestInstance`.
   */
  constructor(options: ExtensionManagerOptions, hooks: LoadHooks = {}, preloaded?: readonly Extension[]) {
    this.namespace = options.namespace;
    this.propagateMapExceptions = options.propagateMapExceptions ?? false;
    this.invokeOnLoad = options.invokeOnLoad ?? false;
    this.invokeArgs = Object.freeze([...(options.invokeArgs ?? [])]);
    this.invokeKwds = Object.freeze({ ...(options.invokeKwds ?? {}) });
    this.logger = options.logger;
    this.onLoadFailure = options.onLoadFailure;

    let loaded: Extension[];
    if (preloaded !== undefined) {
      this.entryPoints = Object.freeze([]);
      loaded = [...preloaded];
    } else {
      const source = options.source ?? defaultRegistry;
      this.entryPoints = Object.freeze([...source.listEntries(this.namespace)]);
      loaded = this.loadPlugins(this.entryPoints, hooks);
    }

    const arranged = hooks.arrange ? hooks.arrange(loaded) : loaded;
    this.extensions = Object.freeze([...arranged]);
  }

  static makeTestInstance(extensions: readonly Extension[], options: TestInstanceOptions = {}): ExtensionManager {
    return new ExtensionManager(
      {
        namespace: TEST_NAMESPACE,
        propagateMapExceptions: options.propagateMapExceptions,
        logger: options.logger,
      },
      {},
      extensions,
    );
  }

  get size(): number {
    return this.extensions.length;
  }

  [Symbol.iterator](): Iterator<Extension> {
    return this.extensions[Symbol.iterator]();
  }

  names(): string[] {
    return this.extensions.map((extension) => extension.name);
  }

  /**
   * Entries the source advertised for the namespace at construction, loaded
   * or not. Test instances have no source and report none.
   */
  listEntryPoints(): readonly EntryDescriptor[] {
    return this.entryPoints;
  }

  entryPointNames(): string[] {
    return this.listEntryPoints().map((entry) => entry.name);
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  /** First extension named `name`, in iteration order. */
  find(name: string): Extension | undefined {
    return this.extensions.find((extension) => extension.name === name);
  }

  get(name: string): Extension {
    const extension = this.find(name);
    if (extension === undefined) {
      throw new ExtensionNotFoundError(this.namespace, name);
    }
    return extension;
  }

  map<TResult, TArgs extends unknown[]>(func: MapFunction<TResult, TArgs>, ...args: TArgs): TResult[] {
    const results: TResult[] = [];

    for (const extension of this.extensions) {
      try {
        results.push(func(extension, ...args));
      } catch (error) {
        if (this.propagateMapExceptions) {
          throw error;
        }
        this.logger?.error?.(`error calling extension "${extension.name}": ${toErrorMessage(error)}`, {
          namespace: this.namespace,
          extension: extension.name,
        });
      }
    }

    return results;
  }

  /** `map` over `extension.obj[methodName](...args)`. */
  mapMethod(methodName: string, ...args: unknown[]): unknown[] {
    return this.map(callObjMethod, methodName, args);
  }

  private loadPlugins(entries: readonly EntryDescriptor[], hooks: LoadHooks): Extension[] {
    const loaded: Extension[] = [];

    for (const entry of entries) {
      if (hooks.select && !hooks.select(entry)) {
        continue;
      }

      const extension = this.loadOnePlugin(entry);
      if (extension === undefined) {
        continue;
      }

      if (hooks.accept && !hooks.accept(extension)) {
        continue;
      }

      loaded.push(extension);
    }

    return loaded;
  }

  private loadOnePlugin(entry: EntryDescriptor): Extension | undefined {
    try {
      return this.buildExtension(entry);
    } catch (error) {
      const failure =
        error instanceof ExtensionLoadError
          ? error
          : new ExtensionLoadError(toErrorMessage(error), "E_EXT_RESOLVE", entry.name, undefined, { cause: error });

      this.logger?.error?.(`could not load extension "${entry.name}": ${failure.message}`, {
        namespace: this.namespace,
        extension: entry.name,
        code: failure.code,
      });
      this.onLoadFailure?.(entry, failure);
      return undefined;
    }
  }

  private buildExtension(entry: EntryDescriptor): Extension {
    let plugin: unknown;
    try {
      plugin = entry.resolve();
    } catch (error) {
      const suggestion = entry.value ? `check that "${entry.value}" can be required and exports that member` : undefined;
      throw new ExtensionLoadError(toErrorMessage(error), "E_EXT_RESOLVE", entry.name, suggestion, { cause: error });
    }

    if (!this.invokeOnLoad) {
      return createExtension({ name: entry.name, entryPoint: entry, plugin });
    }

    let obj: unknown;
    try {
      obj = invokePlugin(plugin, this.invokeArgs, this.invokeKwds);
    } catch (error) {
      throw new ExtensionLoadError(
        toErrorMessage(error),
        "E_EXT_INVOKE",
        entry.name,
        "check the plugin's constructor or factory function",
        { cause: error },
      );
    }

    return createExtension({ name: entry.name, entryPoint: entry, plugin, obj });
  }
}

function callObjMethod(extension: Extension, methodName: string, args: unknown[]): unknown {
  const target = extension.obj;
  if (typeof target !== "object" || target === null) {
    throw new TypeError(`extension "${extension.name}" has no invoked object`);
  }

  const method: unknown = Reflect.get(target, methodName);
  if (typeof method !== "function") {
    throw new TypeError(`extension "${extension.name}" has no method "${methodName}"`);
  }

  const result: unknown = Reflect.apply(method, target, args);
  return result;
}
