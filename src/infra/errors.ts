export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/** The tool provider could not be reached while loading the catalog. Fatal at startup. */
export class CatalogUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CATALOG_UNAVAILABLE", { cause });
    this.name = "CatalogUnavailableError";
  }
}

/** The reasoning service failed (transport, auth or API error). Ends the current turn only. */
export class ReasoningUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "REASONING_UNAVAILABLE", { cause });
    this.name = "ReasoningUnavailableError";
  }
}

export class ToolInvocationError extends AppError {
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super(message, "TOOL_INVOCATION_FAILED", { cause });
    this.name = "ToolInvocationError";
    this.toolName = toolName;
  }
}

export class ToolArgumentError extends AppError {
  constructor(toolName: string, detail: string) {
    super(`Invalid arguments for ${toolName}: ${detail}`, "TOOL_ARGUMENT_INVALID");
    this.name = "ToolArgumentError";
  }
}

export class TranscriptError extends AppError {
  constructor(message: string) {
    super(message, "TRANSCRIPT_INVALID");
    this.name = "TranscriptError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}
