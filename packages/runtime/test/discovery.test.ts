import * as path from "node:path";
import { describe, expect, it } from "vitest";

import {
  CompositeEntryPointSource,
  EntryPointRegistry,
  EntryPointSpecError,
  ExtensionManager,
  ManifestEntryPointSource,
  ManifestError,
  PackageEntryPointSource,
  createModuleEntry,
  parseEntryPointSpec,
  readEntryPointTable,
} from "../src/index.js";
import { createRecordingLogger, FIXTURES_DIR } from "./helpers.js";

const MANIFEST_PATH = path.join(FIXTURES_DIR, "manifest", "plugboard.yaml");
const PACKAGES_DIR = path.join(FIXTURES_DIR, "packages");

describe("parseEntryPointSpec", () => {
  it("splits module and export path", () => {
    expect(parseEntryPointSpec("./plugins/a.cjs:Formatter")).toEqual({
      module: "./plugins/a.cjs",
      exportPath: ["Formatter"],
    });
    expect(parseEntryPointSpec("some-package/lib:factories.create")).toEqual({
      module: "some-package/lib",
      exportPath: ["factories", "create"],
    });
  });

  it("treats a spec without export path as the whole module", () => {
    expect(parseEntryPointSpec(" ./plugins/a.cjs ")).toEqual({ module: "./plugins/a.cjs", exportPath: [] });
    expect(parseEntryPointSpec("C:\\plugins\\a.cjs")).toEqual({ module: "C:\\plugins\\a.cjs", exportPath: [] });
  });

  it("rejects malformed specs", () => {
    expect(() => parseEntryPointSpec("")).toThrow(EntryPointSpecError);
    expect(() => parseEntryPointSpec(":Formatter")).toThrow("entry point spec has no module: :Formatter");
    expect(() => parseEntryPointSpec("./a.cjs:")).toThrow("entry point spec has an empty export path: ./a.cjs:");
    expect(() => parseEntryPointSpec("./a.cjs:not-valid")).toThrow(
      'invalid export path "not-valid" in entry point spec: ./a.cjs:not-valid',
    );
  });
});

describe("readEntryPointTable", () => {
  it("flattens maps and plain objects in order", () => {
    const table = new Map<string, unknown>([
      ["b.ns", new Map([["z", "./z.cjs"], ["a", "./a.cjs"]])],
      ["a.ns", { one: "./one.cjs:One" }],
    ]);

    expect(readEntryPointTable(table)).toEqual({
      entries: [
        { namespace: "b.ns", name: "z", spec: "./z.cjs" },
        { namespace: "b.ns", name: "a", spec: "./a.cjs" },
        { namespace: "a.ns", name: "one", spec: "./one.cjs:One" },
      ],
      errors: [],
    });
  });

  it("reports invalid shapes", () => {
    expect(readEntryPointTable({ ns: ["./a.cjs"], other: { x: 1 } }).errors).toEqual([
      "entryPoints.ns must be a mapping of name to module spec",
      "entryPoints.other.x must be a string",
    ]);
    expect(readEntryPointTable("nope").errors).toEqual(["entryPoints must be a mapping of namespace to entries"]);
  });
});

describe("EntryPointRegistry", () => {
  it("lists entries per namespace in registration order", () => {
    const registry = new EntryPointRegistry();
    registry.register("ns", "first", () => 1);
    registry.register("ns", "second", () => 2, { value: "./second.cjs", origin: "test" });
    registry.register("other", "x", () => 3);

    expect(registry.listEntries("ns").map((entry) => entry.name)).toEqual(["first", "second"]);
    expect(registry.listEntries("ns")[1]?.value).toBe("./second.cjs");
    expect(registry.listEntries("missing")).toEqual([]);
    expect(registry.listNamespaces()).toEqual(["ns", "other"]);
  });

  it("replaces a re-registered name in place", () => {
    const registry = new EntryPointRegistry();
    registry.register("ns", "a", () => "old");
    registry.register("ns", "b", () => "b");
    registry.register("ns", "a", () => "new");

    expect(registry.listEntries("ns").map((entry) => [entry.name, entry.resolve()])).toEqual([
      ["a", "new"],
      ["b", "b"],
    ]);
  });

  it("unregisters and clears", () => {
    const registry = new EntryPointRegistry();
    registry.register("ns", "a", () => 1);
    registry.register("other", "b", () => 2);

    expect(registry.unregister("ns", "a")).toBe(true);
    expect(registry.unregister("ns", "a")).toBe(false);
    expect(registry.listNamespaces()).toEqual(["other"]);

    registry.clear();
    expect(registry.listNamespaces()).toEqual([]);
  });
});

describe("createModuleEntry", () => {
  it("resolves a module export relative to its base directory", () => {
    const entry = createModuleEntry({
      namespace: "text.filters",
      name: "trim",
      spec: "./plugins/trim.cjs",
      baseDir: path.join(FIXTURES_DIR, "manifest"),
    });

    const trim: unknown = entry.resolve();
    expect(typeof trim).toBe("function");
    expect(entry.value).toBe("./plugins/trim.cjs");
  });

  it("fails on resolve when the export is missing", () => {
    const entry = createModuleEntry({
      namespace: "text.filters",
      name: "nothing",
      spec: "./plugins/formatters.cjs:Nothing",
      baseDir: path.join(FIXTURES_DIR, "manifest"),
    });

    expect(() => entry.resolve()).toThrow('module has no export "Nothing"');
  });
});

describe("ManifestEntryPointSource", () => {
  it("lists manifest entries in declaration order", async () => {
    const source = await ManifestEntryPointSource.fromFiles([MANIFEST_PATH]);

    expect(source.listEntries("text.formatters").map((entry) => entry.name)).toEqual(["upper", "lower", "broken"]);
    expect(source.listEntries("text.filters").map((entry) => entry.origin)).toEqual([MANIFEST_PATH]);
    expect(source.files).toEqual([MANIFEST_PATH]);
  });

  it("loads and invokes manifest plugins through a manager", async () => {
    const logger = createRecordingLogger();
    const source = await ManifestEntryPointSource.fromFiles([MANIFEST_PATH]);

    const manager = new ExtensionManager({
      namespace: "text.formatters",
      source,
      logger,
      invokeOnLoad: true,
      invokeKwds: { prefix: "> " },
    });

    expect(manager.names()).toEqual(["upper", "lower"]);
    expect(manager.mapMethod("format", "Hi")).toEqual(["> HI", "> hi"]);
    expect(logger.records.filter((record) => record.level === "error").map((record) => record.data?.code)).toEqual([
      "E_EXT_RESOLVE",
    ]);
  });

  it("rejects manifests with invalid entries", () => {
    const content = ["entryPoints:", "  text.formatters:", "    bad: ./a.cjs:not-valid", ""].join("\n");

    expect(() => ManifestEntryPointSource.fromString(content, "/tmp/plugboard.yaml")).toThrow(ManifestError);
  });

  it("rejects a manifest whose root is not a mapping", () => {
    expect(() => ManifestEntryPointSource.fromString("- a\n- b\n", "/tmp/plugboard.yaml")).toThrow(
      "manifest root must be a mapping: /tmp/plugboard.yaml",
    );
  });

  it("accepts an empty manifest", () => {
    const source = ManifestEntryPointSource.fromString("", "/tmp/plugboard.yaml");

    expect(source.listEntries("anything")).toEqual([]);
  });

  it("fails for a missing manifest file", async () => {
    await expect(ManifestEntryPointSource.fromFiles([path.join(FIXTURES_DIR, "absent.yaml")])).rejects.toThrow(
      ManifestError,
    );
  });
});

describe("PackageEntryPointSource", () => {
  it("collects entry points from package.json files in package name order", async () => {
    const source = await PackageEntryPointSource.scan([PACKAGES_DIR]);

    expect(source.packages).toEqual(["@acme/quote-formatter", "csv-formatter"]);
    expect(source.listEntries("text.formatters").map((entry) => [entry.name, entry.origin])).toEqual([
      ["quote", "@acme/quote-formatter"],
      ["csv", "csv-formatter"],
    ]);
  });

  it("ignores directories that do not exist", async () => {
    const source = await PackageEntryPointSource.scan([path.join(FIXTURES_DIR, "no-such-dir")]);

    expect(source.packages).toEqual([]);
  });

  it("feeds a manager", async () => {
    const source = await PackageEntryPointSource.scan([PACKAGES_DIR]);

    const manager = new ExtensionManager({ namespace: "text.formatters", source, invokeOnLoad: true });

    expect(manager.mapMethod("format", "a b")).toEqual(['"a b"', "a,b"]);
  });
});

describe("CompositeEntryPointSource", () => {
  it("concatenates sources in order", async () => {
    const manifests = await ManifestEntryPointSource.fromFiles([MANIFEST_PATH]);
    const packages = await PackageEntryPointSource.scan([PACKAGES_DIR]);

    const source = new CompositeEntryPointSource([manifests, packages]);

    expect(source.listEntries("text.formatters").map((entry) => entry.name)).toEqual([
      "upper",
      "lower",
      "broken",
      "quote",
      "csv",
    ]);
  });
});
