import type { EntryDescriptor, Extension } from "@plugboard/types";

export interface CreateExtensionInput<TPlugin, TObj> {
  name: string;
  plugin: TPlugin;
  obj?: TObj;
  entryPoint?: EntryDescriptor;
}

export function createExtension<TPlugin, TObj = unknown>(
  input: CreateExtensionInput<TPlugin, TObj>,
): Extension<TPlugin, TObj> {
  return Object.freeze({
    name: input.name,
    entryPoint: input.entryPoint,
    plugin: input.plugin,
    obj: input.obj,
  });
}

/**
 * Class syntax, or an old-style constructor whose prototype carries members.
 * Bound classes have no prototype and are caught by `requiresNew` instead.
 */
function isConstructor(value: Function): boolean {
  if (Function.prototype.toString.call(value).startsWith("class")) {
    return true;
  }

  const prototype: unknown = Reflect.get(value, "prototype");
  if (typeof prototype !== "object" || prototype === null) {
    return false;
  }
  return Object.getOwnPropertyNames(prototype).some((key) => key !== "constructor");
}

// Raised by V8 for class constructors and by transpiled class-call guards.
const NEW_REQUIRED = /cannot be invoked without 'new'|Cannot call a class as a function/;

function requiresNew(error: unknown): boolean {
  return error instanceof TypeError && NEW_REQUIRED.test(error.message);
}

/**
 * Calls a loaded plugin the way invoke-on-load does: constructors are
 * constructed, other functions are called. A call rejected for lacking `new`
 * is retried as a construction. Named arguments travel as one trailing object
 * and are left out entirely when empty.
 */
export function invokePlugin(
  plugin: unknown,
  args: readonly unknown[],
  kwds: Readonly<Record<string, unknown>>,
): unknown {
  if (typeof plugin !== "function") {
    throw new TypeError(`plugin is not callable (got ${plugin === null ? "null" : typeof plugin})`);
  }

  const callArgs: unknown[] = Object.keys(kwds).length > 0 ? [...args, { ...kwds }] : [...args];

  if (isConstructor(plugin)) {
    const instance: unknown = Reflect.construct(plugin, callArgs);
    return instance;
  }

  try {
    const result: unknown = Reflect.apply(plugin, undefined, callArgs);
    return result;
  } catch (error) {
    if (!requiresNew(error)) {
      throw error;
    }
    const instance: unknown = Reflect.construct(plugin, callArgs);
    return instance;
  }
}
