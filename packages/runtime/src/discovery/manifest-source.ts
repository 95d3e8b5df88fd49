import { promises as fs } from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import type { EntryDescriptor, EntryPointSource } from "@plugboard/types";
import { EntryPointSpecError, ManifestError, toErrorMessage } from "../errors.js";
import { createModuleEntry } from "./entry-point-spec.js";
import { readEntryPointTable } from "./entry-table.js";

export const DEFAULT_MANIFEST_FILE_NAME = "plugboard.yaml";

/**
 * Entry points declared in YAML manifests:
 *
 * ```yaml
 * entryPoints:
 *   report.formatters:
 *     csv: ./formatters/csv.cjs:CsvFormatter
 *     json: ./formatters/json.cjs
 * ```
 *
 * Relative modules resolve against the manifest's directory. Manifests are
 * read once by {@link ManifestEntryPointSource.fromFiles}; `listEntries` is
 * synchronous afterwards.
 */
export class ManifestEntryPointSource implements EntryPointSource {
  private readonly entries = new Map<string, EntryDescriptor[]>();
  readonly files: readonly string[];

  private constructor(files: string[]) {
    this.files = files;
  }

  static async fromFiles(paths: readonly string[], cwd: string = process.cwd()): Promise<ManifestEntryPointSource> {
    const absolute = paths.map((filePath) => path.resolve(cwd, filePath));
    const source = new ManifestEntryPointSource(absolute);

    for (const filePath of absolute) {
      let content: string;
      try {
        content = await fs.readFile(filePath, "utf8");
      } catch (error) {
        throw new ManifestError(`cannot read manifest ${filePath}: ${toErrorMessage(error)}`, filePath, {
          cause: error,
        });
      }
      source.addManifest(filePath, content);
    }

    return source;
  }

  static fromString(content: string, filePath: string): ManifestEntryPointSource {
    const absolute = path.resolve(filePath);
    const source = new ManifestEntryPointSource([absolute]);
    source.addManifest(absolute, content);
    return source;
  }

  listEntries(namespace: string): readonly EntryDescriptor[] {
    return [...(this.entries.get(namespace) ?? [])];
  }

  private addManifest(filePath: string, content: string): void {
    let document: unknown;
    try {
      document = YAML.parse(content, { mapAsMap: true });
    } catch (error) {
      throw new ManifestError(`invalid YAML in ${filePath}: ${toErrorMessage(error)}`, filePath, { cause: error });
    }

    if (document === null || document === undefined) {
      return;
    }

    if (!(document instanceof Map)) {
      throw new ManifestError(`manifest root must be a mapping: ${filePath}`, filePath);
    }

    const table: unknown = document.get("entryPoints");
    if (table === undefined || table === null) {
      return;
    }

    const { entries, errors } = readEntryPointTable(table);
    if (errors.length > 0) {
      throw new ManifestError(`${filePath}: ${errors.join("; ")}`, filePath);
    }

    for (const entry of entries) {
      try {
        const descriptor = createModuleEntry({
          namespace: entry.namespace,
          name: entry.name,
          spec: entry.spec,
          baseDir: path.dirname(filePath),
          origin: filePath,
        });
        const list = this.entries.get(entry.namespace) ?? [];
        list.push(descriptor);
        this.entries.set(entry.namespace, list);
      } catch (error) {
        if (error instanceof EntryPointSpecError) {
          throw new ManifestError(`${filePath}: ${error.message}`, filePath, { cause: error });
        }
        throw error;
      }
    }
  }
}
