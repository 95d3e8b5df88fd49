export * from "./errors.js";

export * from "./logging/logger.js";

export * from "./discovery/entry-point-spec.js";
export { readEntryPointTable, type DeclaredEntry } from "./discovery/entry-table.js";
export * from "./discovery/registry.js";
export * from "./discovery/manifest-source.js";
export * from "./discovery/package-source.js";

export * from "./manager/extension.js";
export * from "./manager/extension-manager.js";
export * from "./manager/enabled-extension-manager.js";
export * from "./manager/named-extension-manager.js";

export * from "./config/config.js";
