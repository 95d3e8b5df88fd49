export class ExtensionLoadError extends Error {
  constructor(
    message: string,
    public readonly code: "E_EXT_RESOLVE" | "E_EXT_INVOKE",
    public readonly extensionName: string,
    public readonly suggestion?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExtensionLoadError";
  }
}

export class ExtensionNotFoundError extends Error {
  readonly code = "E_EXT_NOT_FOUND";

  constructor(
    public readonly namespace: string,
    public readonly extensionName: string,
  ) {
    super(`no extension named "${extensionName}" in ${namespace}`);
    this.name = "ExtensionNotFoundError";
  }
}

export class EntryPointSpecError extends Error {
  readonly code = "E_ENTRY_POINT_SPEC";

  constructor(
    message: string,
    public readonly spec: string,
  ) {
    super(message);
    this.name = "EntryPointSpecError";
  }
}

export class ManifestError extends Error {
  readonly code = "E_MANIFEST";

  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ManifestError";
  }
}

export class ConfigError extends Error {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
