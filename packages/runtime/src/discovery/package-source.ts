import { promises as fs } from "node:fs";
import * as path from "node:path";
import type { EntryDescriptor, EntryPointSource } from "@plugboard/types";
import { isPlainObject } from "@plugboard/types";
import { EntryPointSpecError, ManifestError, toErrorMessage } from "../errors.js";
import { createModuleEntry } from "./entry-point-spec.js";
import { readEntryPointTable } from "./entry-table.js";

/** `package.json` field holding `{ entryPoints: {...} }` */
export const PACKAGE_FIELD = "plugboard";

interface PackageLocation {
  name: string;
  dir: string;
}

function isMissing(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Entry points declared by installed packages in their `package.json`:
 *
 * ```json
 * { "name": "csv-formatter", "plugboard": { "entryPoints": { "report.formatters": { "csv": "./index.cjs:Csv" } } } }
 * ```
 *
 * Every directory passed to {@link PackageEntryPointSource.scan} is treated
 * like a `node_modules` folder: its children (and `@scope/*` grandchildren)
 * are packages. Packages are visited in name order per directory.
 */
export class PackageEntryPointSource implements EntryPointSource {
  private readonly entries = new Map<string, EntryDescriptor[]>();
  private readonly packageNames: string[] = [];

  private constructor() {}

  static async scan(dirs: readonly string[], cwd: string = process.cwd()): Promise<PackageEntryPointSource> {
    const source = new PackageEntryPointSource();

    for (const dir of dirs) {
      const packages = await collectPackages(path.resolve(cwd, dir));
      packages.sort((left, right) => left.name.localeCompare(right.name));

      for (const location of packages) {
        await source.readPackage(location);
      }
    }

    return source;
  }

  /** Packages that declared at least one entry point, in scan order. */
  get packages(): readonly string[] {
    return [...this.packageNames];
  }

  listEntries(namespace: string): readonly EntryDescriptor[] {
    return [...(this.entries.get(namespace) ?? [])];
  }

  private async readPackage(location: PackageLocation): Promise<void> {
    const manifestPath = path.join(location.dir, "package.json");

    let content: string;
    try {
      content = await fs.readFile(manifestPath, "utf8");
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw new ManifestError(`cannot read ${manifestPath}: ${toErrorMessage(error)}`, manifestPath, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ManifestError(`invalid JSON in ${manifestPath}: ${toErrorMessage(error)}`, manifestPath, {
        cause: error,
      });
    }

    if (!isPlainObject(parsed)) {
      return;
    }

    const field = parsed[PACKAGE_FIELD];
    if (field === undefined) {
      return;
    }

    if (!isPlainObject(field)) {
      throw new ManifestError(`${manifestPath}: "${PACKAGE_FIELD}" must be an object`, manifestPath);
    }

    const { entries, errors } = readEntryPointTable(field.entryPoints ?? {});
    if (errors.length > 0) {
      throw new ManifestError(`${manifestPath}: ${errors.join("; ")}`, manifestPath);
    }

    const packageName = typeof parsed.name === "string" ? parsed.name : location.name;
    if (entries.length > 0) {
      this.packageNames.push(packageName);
    }

    for (const entry of entries) {
      let descriptor: EntryDescriptor;
      try {
        descriptor = createModuleEntry({
          namespace: entry.namespace,
          name: entry.name,
          spec: entry.spec,
          baseDir: location.dir,
          origin: packageName,
        });
      } catch (error) {
        if (error instanceof EntryPointSpecError) {
          throw new ManifestError(`${manifestPath}: ${error.message}`, manifestPath, { cause: error });
        }
        throw error;
      }

      const list = this.entries.get(entry.namespace) ?? [];
      list.push(descriptor);
      this.entries.set(entry.namespace, list);
    }
  }
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const dirents = await fs.readdir(dir, { withFileTypes: true });
    return dirents
      .filter((dirent) => (dirent.isDirectory() || dirent.isSymbolicLink()) && !dirent.name.startsWith("."))
      .map((dirent) => dirent.name);
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

async function collectPackages(dir: string): Promise<PackageLocation[]> {
  const collected: PackageLocation[] = [];

  for (const name of await listDirectories(dir)) {
    if (!name.startsWith("@")) {
      collected.push({ name, dir: path.join(dir, name) });
      continue;
    }

    for (const scoped of await listDirectories(path.join(dir, name))) {
      collected.push({ name: `${name}/${scoped}`, dir: path.join(dir, name, scoped) });
    }
  }

  return collected;
}
