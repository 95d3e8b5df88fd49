import type { EntryDescriptor, EntryPointSource } from "@plugboard/types";

export interface RegisterEntryOptions {
  value?: string;
  origin?: string;
}

/**
 * In-memory entry point source. Entries keep registration order within a
 * namespace; registering an existing name again replaces it in place.
 */
export class EntryPointRegistry implements EntryPointSource {
  private readonly namespaces = new Map<string, Map<string, EntryDescriptor>>();

  register(namespace: string, name: string, loader: () => unknown, options: RegisterEntryOptions = {}): EntryDescriptor {
    const descriptor: EntryDescriptor = Object.freeze({
      name,
      namespace,
      value: options.value,
      origin: options.origin,
      resolve: loader,
    });

    this.add(descriptor);
    return descriptor;
  }

  add(descriptor: EntryDescriptor): void {
    let entries = this.namespaces.get(descriptor.namespace);
    if (entries === undefined) {
      entries = new Map();
      this.namespaces.set(descriptor.namespace, entries);
    }
    entries.set(descriptor.name, descriptor);
  }

  unregister(namespace: string, name: string): boolean {
    const entries = this.namespaces.get(namespace);
    if (entries === undefined) {
      return false;
    }

    const removed = entries.delete(name);
    if (entries.size === 0) {
      this.namespaces.delete(namespace);
    }
    return removed;
  }

  clear(namespace?: string): void {
    if (namespace === undefined) {
      this.namespaces.clear();
      return;
    }
    this.namespaces.delete(namespace);
  }

  listNamespaces(): string[] {
    return [...this.namespaces.keys()];
  }

  listEntries(namespace: string): readonly EntryDescriptor[] {
    const entries = this.namespaces.get(namespace);
    if (entries === undefined) {
      return [];
    }
    return [...entries.values()];
  }
}

/**
 * Source used by managers constructed without an explicit `source`.
 */
export const defaultRegistry = new EntryPointRegistry();

export class CompositeEntryPointSource implements EntryPointSource {
  private readonly sources: readonly EntryPointSource[];

  constructor(sources: readonly EntryPointSource[]) {
    this.sources = [...sources];
  }

  listEntries(namespace: string): readonly EntryDescriptor[] {
    const collected: EntryDescriptor[] = [];
    for (const source of this.sources) {
      collected.push(...source.listEntries(namespace));
    }
    return collected;
  }
}
