export type ConfigErrorCode = "MissingPlaceholder" | "BadAlias" | "UnknownColor" | "BadPattern";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;

  public constructor(code: ConfigErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
    this.code = code;
  }
}
