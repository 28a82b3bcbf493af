/**
 * Error taxonomy for schema handling, parameter conversion, the metadata cache
 * and the server connection.
 *
 * Every error carries a stable `code` so callers can branch without matching
 * on message text.
 */

export type ErrorCode =
  | "SCHEMA_ERROR"
  | "CONVERSION_ERROR"
  | "ENUM_ERROR"
  | "FORMAT_ERROR"
  | "REQUIRED_MISSING"
  | "PARAMETER_FORMAT"
  | "CACHE_IO"
  | "CACHE_CORRUPT"
  | "TRANSPORT_ERROR"
  | "TOOL_NOT_FOUND"
  | "CONFIG_ERROR"
  | "USAGE_ERROR";

export class McpInvokeError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "McpInvokeError";
    this.code = code;
  }
}

/** The raw schema value matched neither accepted encoding. */
export class SchemaError extends McpInvokeError {
  constructor(message: string) {
    super(message, "SCHEMA_ERROR");
    this.name = "SchemaError";
  }
}

export interface ConversionDetails {
  parameter: string;
  expectedType: string;
  value: string;
  hint: string;
}

/** A raw string could not be coerced to the declared parameter type. */
export class ConversionError extends McpInvokeError {
  public readonly parameter: string;
  public readonly expectedType: string;
  public readonly value: string;
  public readonly hint: string;

  constructor(
    details: ConversionDetails,
    code: ErrorCode = "CONVERSION_ERROR",
    options: { path?: string; cause?: unknown } = {}
  ) {
    super(
      (options.path ? `${options.path}: ` : "") +
        `parameter ${JSON.stringify(details.parameter)} (type: ${details.expectedType}): ` +
        `cannot convert ${JSON.stringify(details.value)}\nHint: ${details.hint}`,
      code,
      { cause: options.cause }
    );
    this.name = "ConversionError";
    this.parameter = details.parameter;
    this.expectedType = details.expectedType;
    this.value = details.value;
    this.hint = details.hint;
  }
}

export class EnumError extends ConversionError {
  public readonly allowed: readonly unknown[];

  constructor(details: ConversionDetails, allowed: readonly unknown[]) {
    super(details, "ENUM_ERROR");
    this.name = "EnumError";
    this.allowed = allowed;
  }
}

export class FormatError extends ConversionError {
  public readonly format: string;

  constructor(details: ConversionDetails, format: string) {
    super(details, "FORMAT_ERROR");
    this.name = "FormatError";
    this.format = format;
  }
}

/**
 * A conversion failure inside an array element or object property. Carries
 * the innermost failure's details; `path` joins the enclosing locations,
 * outermost first. The original error stays reachable through `cause`.
 */
export class NestedConversionError extends ConversionError {
  public readonly path: string;

  constructor(path: string, cause: ConversionError) {
    const fullPath = cause instanceof NestedConversionError ? `${path}: ${cause.path}` : path;
    super(cause, cause.code, { path: fullPath, cause });
    this.name = "NestedConversionError";
    this.path = fullPath;
  }
}

export class RequiredMissingError extends McpInvokeError {
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`missing required parameters: ${missing.join(", ")}`, "REQUIRED_MISSING");
    this.name = "RequiredMissingError";
    this.missing = missing;
  }
}

/** A `name=value` argument that is not in that shape. */
export class ParameterFormatError extends McpInvokeError {
  constructor(message: string) {
    super(message, "PARAMETER_FORMAT");
    this.name = "ParameterFormatError";
  }
}

export class CacheIOError extends McpInvokeError {
  constructor(message: string, cause?: unknown) {
    super(message, "CACHE_IO", { cause });
    this.name = "CacheIOError";
  }
}

/** Raised inside the cache only; `load()` turns it into a miss. */
export class CacheCorruptError extends McpInvokeError {
  constructor(message: string, cause?: unknown) {
    super(message, "CACHE_CORRUPT", { cause });
    this.name = "CacheCorruptError";
  }
}

export class TransportError extends McpInvokeError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSPORT_ERROR", { cause });
    this.name = "TransportError";
  }
}

export class ToolNotFoundError extends McpInvokeError {
  public readonly tool: string;

  constructor(tool: string) {
    super(`tool ${JSON.stringify(tool)} not found`, "TOOL_NOT_FOUND");
    this.name = "ToolNotFoundError";
    this.tool = tool;
  }
}

/** A configuration file that exists but cannot be used. */
export class ConfigError extends McpInvokeError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", { cause });
    this.name = "ConfigError";
  }
}

/** Conflicting or missing command-line options. */
export class UsageError extends McpInvokeError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
