import type { ToolSchema } from "./types.js";
import { convertValue } from "./converter.js";
import { ParameterFormatError, RequiredMissingError } from "./errors.js";
import { setOwn } from "./schema.js";

export interface ParsedParams {
  params: Record<string, unknown>;
  /** Non-fatal notes, e.g. parameters the schema does not declare */
  warnings: string[];
}

/**
 * Throw a RequiredMissingError naming every required parameter absent from
 * `params`.
 */
export function validateRequired(
  params: Readonly<Record<string, unknown>>,
  schema: ToolSchema
): void {
  const missing = schema.required.filter((name) => !Object.hasOwn(params, name));
  if (missing.length > 0) {
    throw new RequiredMissingError(missing);
  }
}

/**
 * Split one `name=value` argument on its first "=".
 */
export function splitParam(param: string): { name: string; value: string } {
  const eq = param.indexOf("=");
  if (eq === -1) {
    throw new ParameterFormatError(
      `invalid parameter format '${param}', expected name=value`
    );
  }

  const name = param.slice(0, eq).trim();
  const value = param.slice(eq + 1).trim();

  if (name === "") {
    throw new ParameterFormatError(`parameter name cannot be empty in '${param}'`);
  }

  return { name, value };
}

/**
 * Convert raw `name=value` arguments using a tool schema, then check that
 * every required parameter was supplied.
 *
 * Parameters the schema does not declare are kept as raw strings and reported
 * in `warnings`, so a stale or incomplete schema does not block the call.
 */
export function parseParamsWithSchema(args: readonly string[], schema: ToolSchema): ParsedParams {
  const params: Record<string, unknown> = {};
  const warnings: string[] = [];

  for (const arg of args) {
    const { name, value } = splitParam(arg);

    const paramSchema = Object.hasOwn(schema.parameters, name)
      ? schema.parameters[name]
      : undefined;
    if (!paramSchema) {
      warnings.push(`parameter ${JSON.stringify(name)} not found in schema`);
      setOwn(params, name, value);
      continue;
    }

    setOwn(params, name, convertValue(value, paramSchema));
  }

  validateRequired(params, schema);

  return { params, warnings };
}

/**
 * Parse arguments without a schema: every value stays a string.
 */
export function parseRawParams(args: readonly string[]): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const arg of args) {
    const { name, value } = splitParam(arg);
    setOwn(params, name, value);
  }
  return params;
}
